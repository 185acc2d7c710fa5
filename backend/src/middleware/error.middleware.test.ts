import { describe, it, expect, beforeEach, vi } from 'vitest';
import express, { Application } from 'express';
import request from 'supertest';
import { AppError, UpstreamServiceError, ValidationError, errorHandler, notFoundHandler } from './error.middleware';

const buildApp = (): Application => {
  const app = express();
  app.use(express.json());
  app.post('/echo', (req, res) => {
    res.json(req.body);
  });
  app.get('/invalid', () => {
    throw new ValidationError([{ field: 'destination', message: 'Destination is required' }]);
  });
  app.get('/conflict', () => {
    throw new AppError('Already exists', 409);
  });
  app.get('/unconfigured', () => {
    throw new UpstreamServiceError({ service: 'weather', reason: 'not_configured', message: 'no key' });
  });
  app.get('/quota', () => {
    throw new UpstreamServiceError({ service: 'places', reason: 'quota_exceeded', message: 'OVER_QUERY_LIMIT' });
  });
  app.get('/crash', () => {
    throw new Error('connection to db-internal:5432 refused');
  });
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
};

describe('errorHandler', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('lists field errors for validation failures', async () => {
    const response = await request(buildApp()).get('/invalid');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      status: 'error',
      message: 'Invalid request',
      errors: [{ field: 'destination', message: 'Destination is required' }]
    });
  });

  it('uses the status of operational errors', async () => {
    const response = await request(buildApp()).get('/conflict');

    expect(response.status).toBe(409);
    expect(response.body).toEqual({ status: 'error', message: 'Already exists' });
  });

  it('maps upstream failures to gateway statuses', async () => {
    const unconfigured = await request(buildApp()).get('/unconfigured');
    const quota = await request(buildApp()).get('/quota');

    expect(unconfigured.status).toBe(503);
    expect(unconfigured.body.message).toBe('The weather service is not available. Please check the API key configuration.');
    expect(quota.status).toBe(502);
    expect(quota.body.message).toBe('The places service is over its usage quota. Please try again later.');
  });

  it('hides the details of unexpected errors', async () => {
    const response = await request(buildApp()).get('/crash');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ status: 'error', message: 'Internal server error' });
  });

  it('answers 400 for a body that is not JSON', async () => {
    const response = await request(buildApp())
      .post('/echo')
      .set('Content-Type', 'application/json')
      .send('{"destination": ');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ status: 'error', message: 'Request body is not valid JSON' });
  });
});

describe('notFoundHandler', () => {
  it('names the unknown route', async () => {
    const response = await request(buildApp()).get('/api/nothing-here');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ status: 'error', message: 'Route /api/nothing-here not found' });
  });
});
