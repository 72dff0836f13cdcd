// services/temperature-gateway/test/conversion.routes.spec.ts

import request from 'supertest';
import type { Express } from 'express';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { AppConfig } from '../../../shared/config/index.js';
import { createApp } from '../src/app.js';
import { ConversionGateway } from '../src/services/conversion.service.js';
import { FakeTemperatureClient, quietLogger } from './fakes.js';

let client: FakeTemperatureClient;
let gateway: ConversionGateway;
let app: Express;

function build(config: Pick<AppConfig, 'env' | 'corsOrigins'>): Express {
  return createApp({ gateway, config, logger: quietLogger });
}

beforeEach(() => {
  // the error middleware logs every failed request
  vi.spyOn(console, 'error').mockImplementation(() => undefined);

  client = new FakeTemperatureClient();
  gateway = new ConversionGateway(client, { batchMaxItems: 0, logger: quietLogger });
  app = build({ env: 'test', corsOrigins: ['*'] });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('GET /', () => {
  it('describes the service and its endpoints', async () => {
    const res = await request(app).get('/').expect(200);
    expect(res.body).toEqual({
      message: 'Temperature Conversion API',
      description: 'REST API wrapper for a SOAP temperature conversion service',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        fahrenheit_to_celsius: '/convert/ftc',
        celsius_to_fahrenheit: '/convert/ctf',
        batch_conversion: '/convert/batch',
      },
    });
  });
});

describe('GET /health', () => {
  it('reports the remote as available', async () => {
    const res = await request(app).get('/health').expect(200);
    expect(res.body).toEqual({ status: 'healthy', soap_service_available: true, version: '1.0.0' });
  });

  it('answers 200 with availability false while conversions answer 503', async () => {
    client.available = false;

    const health = await request(app).get('/health').expect(200);
    expect(health.body).toEqual({ status: 'degraded', soap_service_available: false, version: '1.0.0' });

    const convert = await request(app).post('/convert/ftc').send({ temperature: '32' }).expect(503);
    expect(convert.body.error).toEqual({
      code: 'SOAP_SERVICE_UNAVAILABLE',
      message: 'SOAP service not available',
    });
  });
});

describe('/convert/ftc and /convert/ctf', () => {
  it('converts a POSTed fahrenheit value', async () => {
    const res = await request(app).post('/convert/ftc').send({ temperature: '32' }).expect(200);
    expect(res.body).toEqual({
      original: '32',
      converted: '0',
      from_unit: 'fahrenheit',
      to_unit: 'celsius',
    });
  });

  it('converts a celsius value given as a query parameter', async () => {
    const res = await request(app).get('/convert/ctf').query({ temperature: '25' }).expect(200);
    expect(res.body).toEqual({
      original: '25',
      converted: '77',
      from_unit: 'celsius',
      to_unit: 'fahrenheit',
    });
  });

  it('rejects a missing temperature with 400', async () => {
    const res = await request(app).post('/convert/ftc').send({}).expect(400);
    expect(res.body.error).toEqual({ code: 'INVALID_REQUEST', message: 'temperature is required' });
    expect(res.body.path).toBe('/convert/ftc');
    expect(client.calls).toHaveLength(0);
  });

  it('rejects an empty temperature with 400', async () => {
    const res = await request(app).post('/convert/ftc').send({ temperature: '' }).expect(400);
    expect(res.body.error).toEqual({ code: 'INVALID_REQUEST', message: 'temperature is required' });
    expect(client.calls).toHaveLength(0);
  });

  it('forwards a whitespace-only temperature to the remote', async () => {
    const res = await request(app).post('/convert/ctf').send({ temperature: ' ' }).expect(200);
    expect(res.body.original).toBe(' ');
    expect(client.calls).toEqual([{ operation: 'CelsiusToFahrenheit', value: ' ' }]);
  });

  it('rejects a missing query parameter with 400', async () => {
    const res = await request(app).get('/convert/ctf').expect(400);
    expect(res.body.error.message).toBe('temperature is required');
  });

  it('rejects a non-string temperature with 400', async () => {
    const res = await request(app).post('/convert/ctf').send({ temperature: 32 }).expect(400);
    expect(res.body.error.message).toBe('temperature must be a string');
  });

  it('rejects malformed JSON with 400', async () => {
    const res = await request(app)
      .post('/convert/ftc')
      .set('Content-Type', 'application/json')
      .send('{"temperature":')
      .expect(400);
    expect(res.body.error).toEqual({ code: 'INVALID_REQUEST', message: 'Request body is not valid JSON' });
  });

  it('maps a remote fault to 500', async () => {
    client.faults.set('32', 'Server was unable to process request.');
    const res = await request(app).post('/convert/ftc').send({ temperature: '32' }).expect(500);
    expect(res.body.error).toEqual({
      code: 'CONVERSION_FAILED',
      message: 'Conversion failed: Server was unable to process request.',
    });
  });
});

describe('POST /convert/batch', () => {
  it('converts a list of celsius values', async () => {
    const res = await request(app)
      .post('/convert/batch')
      .send({ temperatures: ['0', '25', '100'], from_unit: 'celsius' })
      .expect(200);
    expect(res.body).toEqual({
      results: ['0°C = 32°F', '25°C = 77°F', '100°C = 212°F'],
      total_converted: 3,
      total_errors: 0,
    });
  });

  it('accepts the unit in any letter case', async () => {
    const res = await request(app)
      .post('/convert/batch')
      .send({ temperatures: ['212'], from_unit: 'Fahrenheit' })
      .expect(200);
    expect(res.body.results).toEqual(['212°F = 100°C']);
  });

  it('reports partial success instead of failing', async () => {
    client.faults.set('25', 'remote fault');
    const res = await request(app)
      .post('/convert/batch')
      .send({ temperatures: ['0', '25'], from_unit: 'celsius' })
      .expect(200);
    expect(res.body).toEqual({
      results: ['0°C = 32°F', 'Error converting 25: Conversion failed: remote fault'],
      total_converted: 1,
      total_errors: 1,
    });
  });

  it('rejects an unknown from_unit with 400', async () => {
    const res = await request(app)
      .post('/convert/batch')
      .send({ temperatures: ['0'], from_unit: 'kelvin' })
      .expect(400);
    expect(res.body.error).toEqual({
      code: 'INVALID_REQUEST',
      message: "from_unit must be 'celsius' or 'fahrenheit'",
    });
    expect(client.calls).toHaveLength(0);
  });

  it('accepts a batch of more than a hundred values', async () => {
    const temperatures = Array.from({ length: 101 }, (_, i) => String(i));
    const res = await request(app)
      .post('/convert/batch')
      .send({ temperatures, from_unit: 'celsius' })
      .expect(200);
    expect(res.body.results).toHaveLength(101);
    expect(res.body.total_converted).toBe(101);
    expect(res.body.total_errors).toBe(0);
  });

  it('rejects an empty list with 400', async () => {
    const res = await request(app)
      .post('/convert/batch')
      .send({ temperatures: [], from_unit: 'celsius' })
      .expect(400);
    expect(res.body.error.message).toBe('No temperatures provided');
  });
});

describe('unexpected errors', () => {
  it('hides the message in production', async () => {
    vi.spyOn(gateway, 'convert').mockRejectedValue(new Error('database exploded'));
    const res = await request(build({ env: 'production', corsOrigins: ['*'] }))
      .post('/convert/ftc')
      .send({ temperature: '32' })
      .expect(500);
    expect(res.body.error).toEqual({ code: 'INTERNAL_ERROR', message: 'Internal server error' });
    expect(res.body.path).toBe('/convert/ftc');
  });

  it('shows the message outside production', async () => {
    vi.spyOn(gateway, 'convert').mockRejectedValue(new Error('database exploded'));
    const res = await request(app).post('/convert/ftc').send({ temperature: '32' }).expect(500);
    expect(res.body.error).toEqual({ code: 'INTERNAL_ERROR', message: 'database exploded' });
  });
});

describe('CORS', () => {
  const allowed = 'https://allowed.example.test';

  it('allows any origin by default', async () => {
    const res = await request(app).get('/health').set('Origin', 'https://other.example.test').expect(200);
    expect(res.headers['access-control-allow-origin']).toBe('*');
  });

  it('echoes a configured origin', async () => {
    const res = await request(build({ env: 'test', corsOrigins: [allowed] }))
      .get('/health')
      .set('Origin', allowed)
      .expect(200);
    expect(res.headers['access-control-allow-origin']).toBe(allowed);
  });

  it('does not allow an origin outside the configured list', async () => {
    const res = await request(build({ env: 'test', corsOrigins: [allowed] }))
      .get('/health')
      .set('Origin', 'https://other.example.test')
      .expect(200);
    expect(res.headers['access-control-allow-origin']).toBeUndefined();
  });
});

describe('unmatched routes', () => {
  it('answers 404 for an unknown path', async () => {
    const res = await request(app).get('/convert/kelvin').expect(404);
    expect(res.body.error).toEqual({
      code: 'NOT_FOUND',
      message: 'Endpoint not found: GET /convert/kelvin',
    });
  });

  it('answers 404 for an unsupported method on a known path', async () => {
    await request(app).delete('/convert/ftc').expect(404);
  });
});
