import express from 'express';
import request from 'supertest';
import { errorHandler, notFoundHandler } from '../errorHandler';
import { HostConflictError, HostNotFoundError, StoreIOError } from '../../utils/errors';
import { logger } from '../../utils/logger';

jest.mock('../../utils/logger');

function buildApp(error: Error): express.Express {
  const app = express();
  app.get('/boom', () => {
    throw error;
  });
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}

describe('errorHandler', () => {
  it('maps domain errors onto their status and code', async () => {
    const response = await request(buildApp(new HostNotFoundError('10.0.0.8'))).get('/boom');

    expect(response.status).toBe(404);
    expect(response.body.error).toMatchObject({
      code: 'NOT_FOUND',
      message: "Host with IP '10.0.0.8' not found",
      statusCode: 404,
      path: '/boom',
    });
    expect(typeof response.body.error.timestamp).toBe('string');
    expect(response.body.stack).toBeUndefined();
  });

  it('reports conflicts as 409', async () => {
    const response = await request(buildApp(new HostConflictError('taken'))).get('/boom');
    expect(response.status).toBe(409);
    expect(response.body.error.code).toBe('HOST_CONFLICT');
  });

  it('reports unknown errors as INTERNAL_ERROR', async () => {
    const response = await request(buildApp(new Error('disk on fire'))).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body.error).toMatchObject({
      code: 'INTERNAL_ERROR',
      message: 'disk on fire',
    });
    expect(logger.error).toHaveBeenCalledWith(
      'Error occurred',
      expect.objectContaining({ statusCode: 500, errorCode: 'INTERNAL_ERROR', path: '/boom', method: 'GET' })
    );
  });

  it('marks store failures as non-operational', () => {
    const error = new StoreIOError('update', new Error('SQLITE_FULL'));
    expect(error.isOperational).toBe(false);
    expect(error.message).toBe('Host store update failed: SQLITE_FULL');
    expect(error.name).toBe('StoreIOError');
  });
});

describe('notFoundHandler', () => {
  it('answers 404 Route not found', async () => {
    const response = await request(buildApp(new Error('unused'))).delete('/nowhere');

    expect(response.status).toBe(404);
    expect(response.body.error).toMatchObject({
      code: 'NOT_FOUND',
      message: 'Route not found',
      statusCode: 404,
      path: '/nowhere',
    });
    expect(logger.warn).toHaveBeenCalledWith('Route not found: DELETE /nowhere');
  });
});
