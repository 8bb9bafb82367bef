import request from 'supertest';

import { app } from '../app';

describe('GET /healthz', () => {
  it('returns service health metadata', async () => {
    const response = await request(app).get('/healthz');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      status: 'ok',
      service: 'biomarker-report-api'
    });
    expect(response.headers['x-request-id']).toEqual(expect.any(String));
  });

  it('reports the configured Gradio Space on readiness', async () => {
    const response = await request(app).get('/healthz/readiness');

    expect(response.status).toBe(200);
    expect(response.body.components.inference).toMatchObject({
      status: 'pass',
      provider: 'gradio',
      target: 'https://test-owner-test-space.hf.space /respond'
    });
  });

  it('echoes allowed CORS origins on preflight', async () => {
    const response = await request(app)
      .options('/analyze')
      .set('Origin', 'http://localhost:5173')
      .set('Access-Control-Request-Headers', 'content-type');

    expect(response.status).toBe(204);
    expect(response.headers['access-control-allow-origin']).toBe('http://localhost:5173');
    expect(response.headers['access-control-allow-methods']).toBe('GET,POST,OPTIONS');
  });
});
