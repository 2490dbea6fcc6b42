import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import axios, { AxiosInstance } from 'axios';
import { Server } from 'http';
import { createApp } from '../src/app';

/**
 * HTTP tests against the Express app on an ephemeral local port
 */
describe('Bouquet Allocation API', () => {
  let server: Server;
  let client: AxiosInstance;

  beforeAll(async () => {
    server = await new Promise<Server>((resolve) => {
      const listening = createApp().listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    client = axios.create({
      baseURL: `http://127.0.0.1:${address.port}`,
      validateStatus: () => true, // Don't throw on any status code
    });
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it('GET /health reports healthy', async () => {
    const response = await client.get('/health');

    expect(response.status).toBe(200);
    expect(response.data.status).toBe('healthy');
  });

  it('GET /v1 describes the API', async () => {
    const response = await client.get('/v1');

    expect(response.data).toEqual({ version: '1.0.0', api: 'Bouquet Allocation API' });
  });

  it('POST /v1/allocations allocates structured records', async () => {
    const response = await client.post('/v1/allocations', {
      designs: [
        {
          name: 'A',
          size: 'L',
          total: 30,
          required: [
            { species: 'a', quantity: 10 },
            { species: 'b', quantity: 15 },
            { species: 'c', quantity: 5 },
          ],
        },
        {
          name: 'B',
          size: 'L',
          total: 21,
          required: [
            { species: 'b', quantity: 15 },
            { species: 'c', quantity: 1 },
          ],
        },
      ],
      stock: [
        { species: 'a', size: 'L', quantity: 20 },
        { species: 'b', size: 'L', quantity: 20 },
        { species: 'c', size: 'L', quantity: 20 },
      ],
    });

    expect(response.status).toBe(200);
    expect(response.data.data.completed).toEqual(['AL10a15b5c']);
    expect(response.data.data.bouquets[1].deactivationReason).toBe('RELEASED');
    expect(response.data.data.deactivations).toBe(1);
  });

  it('POST /v1/allocations rejects an unknown size', async () => {
    const response = await client.post('/v1/allocations', {
      designs: [{ name: 'A', size: 'M', total: 3, required: [] }],
      stock: [],
    });

    expect(response.status).toBe(400);
    expect(response.data.error.code).toBe('VALIDATION_ERROR');
    expect(response.data.error.details.errors).toEqual([
      { field: 'body.designs.0.size', message: 'Size must be one of L, S' },
    ]);
  });

  it('POST /v1/allocations rejects stock beyond safe integer precision', async () => {
    const response = await client.post('/v1/allocations', {
      designs: [{ name: 'A', size: 'L', total: 3, required: [{ species: 'a', quantity: 1 }] }],
      stock: [{ species: 'a', size: 'L', quantity: 9007199254740994 }],
    });

    expect(response.status).toBe(400);
    expect(response.data.error.code).toBe('VALIDATION_ERROR');
    expect(response.data.error.details.errors).toEqual([
      { field: 'body.stock.0.quantity', message: 'Quantity is too large' },
    ]);
  });

  it('POST /v1/allocations/text allocates text records', async () => {
    const response = await client.post('/v1/allocations/text', {
      designs: ['AS2a3'],
      flowers: ['aS', 'aS', 'bS', 'bS'],
    });

    expect(response.status).toBe(200);
    expect(response.data.data.completed).toEqual(['AS2a1b']);
    expect(response.data.data.remainingStock).toEqual([
      { species: 'a', size: 'L', quantity: 0 },
      { species: 'a', size: 'S', quantity: 0 },
      { species: 'b', size: 'L', quantity: 0 },
      { species: 'b', size: 'S', quantity: 1 },
    ]);
  });

  it('POST /v1/allocations/text reports the bad line', async () => {
    const response = await client.post('/v1/allocations/text', {
      designs: ['AL10a30', 'hello'],
      flowers: [],
    });

    expect(response.status).toBe(400);
    expect(response.data.error).toEqual({
      code: 'INVALID_DESIGN_RECORD',
      message: 'Invalid bouquet design on line 2: "hello"',
      details: { line: 2, text: 'hello' },
    });
  });

  it('POST with malformed JSON returns INVALID_INPUT', async () => {
    const response = await client.post('/v1/allocations', '{"designs": [', {
      headers: { 'Content-Type': 'application/json' },
      transformRequest: [(data: unknown) => data],
    });

    expect(response.status).toBe(400);
    expect(response.data.error.code).toBe('INVALID_INPUT');
  });

  it('GET /v1/allocations/sample runs the sample data', async () => {
    const response = await client.get('/v1/allocations/sample');

    expect(response.status).toBe(200);
    expect(response.data.message).toBe('Sample allocation');
    expect(response.data.data.completed).toEqual(['AS10a10b5c']);
  });

  it('GET /openapi.json serves the OpenAPI document', async () => {
    const response = await client.get('/openapi.json');

    expect(response.status).toBe(200);
    expect(response.data.info.title).toBe('Bouquet Allocation API');
  });

  it('unknown routes return 404', async () => {
    const response = await client.get('/v1/unknown');

    expect(response.status).toBe(404);
    expect(response.data.error).toEqual({
      code: 'NOT_FOUND',
      message: 'Route GET /v1/unknown not found',
    });
  });
});
