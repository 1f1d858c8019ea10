import path from 'path';
import winston from 'winston';
import { logger } from '../logger';
import { config } from '../../config';

describe('logger utility', () => {
  it('is a winston logger with the configured level', () => {
    expect(logger).toBeInstanceOf(winston.Logger);
    expect(logger.level).toBe(config.logging.level);
  });

  it('defines the five levels in priority order', () => {
    expect(logger.levels).toEqual({ error: 0, warn: 1, info: 2, http: 3, debug: 4 });
  });

  it('silences the console transport under test', () => {
    const consoleTransports = logger.transports.filter(
      (transport) => transport instanceof winston.transports.Console
    );
    expect(consoleTransports).toHaveLength(1);
    expect(consoleTransports[0].silent).toBe(true);
  });

  it('writes errors and combined output to files in the log directory', () => {
    const files = logger.transports.filter(
      (transport): transport is winston.transports.FileTransportInstance =>
        transport instanceof winston.transports.File
    );

    expect(files.map((file) => file.filename).sort()).toEqual(['combined.log', 'error.log']);
    const logDir = path.dirname(path.join(config.logging.dir, 'error.log'));
    expect(files.map((file) => file.dirname)).toEqual([logDir, logDir]);

    const errorFile = files.find((file) => file.filename === 'error.log');
    expect(errorFile?.level).toBe('error');
  });

  describe('logging calls', () => {
    beforeEach(() => {
      logger.transports.forEach((transport) => {
        transport.silent = true;
      });
    });

    afterEach(() => {
      logger.transports.forEach((transport) => {
        transport.silent = transport instanceof winston.transports.Console;
      });
    });

    it.each(['error', 'warn', 'info', 'http', 'debug'] as const)('accepts %s messages with metadata', (level) => {
      expect(() => logger[level]('Test message', { ip: '192.0.2.1' })).not.toThrow();
    });
  });
});
