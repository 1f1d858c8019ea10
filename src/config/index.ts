import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config({
  quiet: process.env.NODE_ENV === 'test' || process.env.DOTENV_CONFIG_QUIET === 'true',
});

export function getEnvNumber(key: string, defaultValue: number): number {
  const rawValue = process.env[key];
  const parsedValue = rawValue ? parseInt(rawValue, 10) : defaultValue;
  return Number.isNaN(parsedValue) ? defaultValue : parsedValue;
}

export function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const rawValue = process.env[key];
  if (rawValue === undefined) {
    return defaultValue;
  }

  return ['1', 'true', 'yes', 'on'].includes(rawValue.toLowerCase());
}

const parsedCorsOrigins = process.env.CORS_ORIGINS
  ?.split(',')
  .map((origin) => origin.trim())
  .filter((origin) => origin.length > 0);

const defaultCorsOrigins = process.env.NODE_ENV === 'production' ? [] : ['*'];

export const config = {
  server: {
    port: getEnvNumber('PORT', 8080),
    host: process.env.HOST || '0.0.0.0',
    env: process.env.NODE_ENV || 'development',
  },
  database: {
    path: process.env.DB_PATH || './data/hosts.db',
  },
  identity: {
    file: process.env.IDENTITY_FILE || './data/identity.id',
    // Overrides interface detection for the address this node advertises
    hostIp: process.env.HOST_IP || '',
  },
  network: {
    managementPort: getEnvNumber('MANAGEMENT_PORT', 8080),
    cmsPort: getEnvNumber('CMS_PORT', 80),
    probeTimeoutMs: getEnvNumber('PROBE_TIMEOUT_MS', 3000),
    peerTimeoutMs: getEnvNumber('PEER_TIMEOUT_MS', 2000),
    pushTimeoutMs: getEnvNumber('PUSH_TIMEOUT_MS', 5000),
    scanDialTimeoutMs: getEnvNumber('SCAN_DIAL_TIMEOUT_MS', 500),
    scanConcurrency: getEnvNumber('SCAN_CONCURRENCY', 50),
    scanBudgetMs: getEnvNumber('SCAN_BUDGET_MS', 30000), // 30 seconds
  },
  sync: {
    sweepEnabled: getEnvBoolean('SWEEP_ENABLED', true),
    sweepIntervalMs: getEnvNumber('SWEEP_INTERVAL_MS', 60000), // 1 minute
    selfRegisterIntervalMs: getEnvNumber('SELF_REGISTER_INTERVAL_MS', 30000),
  },
  backups: {
    maxBackups: getEnvNumber('MAX_BACKUPS', 20),
    manualMaxBackups: getEnvNumber('MANUAL_MAX_BACKUPS', 100),
  },
  cors: {
    origins: parsedCorsOrigins && parsedCorsOrigins.length > 0
      ? parsedCorsOrigins
      : defaultCorsOrigins,
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    dir: process.env.LOG_DIR || 'logs',
  },
};
