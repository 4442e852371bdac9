import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EnvValidationError, ValidationError } from '@schoolreg/core';

import { loadGatewayConfig } from '../config.js';

const POOLS = {
  default: ['http://api:8080'],
  reader: ['http://api-reader:8082'],
  writer: ['http://api-writer:8084'],
};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

describe('loadGatewayConfig', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'schoolreg-gateway-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  async function writeConfig(content: unknown): Promise<string> {
    const file = path.join(directory, 'gateway.json');
    await writeFile(file, JSON.stringify(content));
    return file;
  }

  it('should load the bundled configuration with defaults', () => {
    const config = loadGatewayConfig({});

    expect(config.server).toEqual({ port: 8086, host: '0.0.0.0' });
    expect(config.timeoutMs).toBe(30000);
    expect(config.routes.map((route) => [route.upstreamPathTemplate, route.pool])).toEqual([
      ['/api/reader/{everything}', 'reader'],
      ['/api/writer/{everything}', 'writer'],
      ['/api/{everything}', 'default'],
    ]);
    expect(config.pools).toEqual({
      default: ['http://localhost:8080'],
      reader: ['http://localhost:8082'],
      writer: ['http://localhost:8084'],
    });
    expect(Object.isFrozen(config.pools)).toBe(true);
  });

  it('should replace pool hosts from the environment', () => {
    const config = loadGatewayConfig({
      GATEWAY_POOL_READER: 'http://reader-1:8082, http://reader-2:8082',
      GATEWAY_TIMEOUT_MS: '5000',
    });

    expect(config.pools.reader).toEqual(['http://reader-1:8082', 'http://reader-2:8082']);
    expect(config.pools.writer).toEqual(['http://localhost:8084']);
    expect(config.timeoutMs).toBe(5000);
  });

  it('should reject a pool override that is not a URL', () => {
    expect(() => loadGatewayConfig({ GATEWAY_POOL_WRITER: 'writer-host' })).toThrow(
      ValidationError
    );
  });

  it('should reject an invalid timeout', () => {
    expect(() => loadGatewayConfig({ GATEWAY_TIMEOUT_MS: '0' })).toThrow(EnvValidationError);
  });

  it('should read the file named by GATEWAY_CONFIG_PATH and normalize verbs', async () => {
    const file = await writeConfig({
      routes: [
        {
          upstreamPathTemplate: '/{everything}',
          upstreamMethods: ['get', 'post'],
          pool: 'Default',
          downstreamPathTemplate: '/{everything}',
        },
      ],
      pools: POOLS,
    });

    const config = loadGatewayConfig({ GATEWAY_CONFIG_PATH: file });

    expect(config.routes).toEqual([
      {
        upstreamPathTemplate: '/{everything}',
        upstreamMethods: ['GET', 'POST'],
        pool: 'default',
        downstreamPathTemplate: '/{everything}',
      },
    ]);
    expect(config.pools.default).toEqual(['http://api:8080']);
  });

  it('should fail startup when a write is routed to the reader pool', async () => {
    const file = await writeConfig({
      routes: [
        {
          upstreamPathTemplate: '/api/reader/{everything}',
          upstreamMethods: ['GET', 'DELETE'],
          pool: 'reader',
          downstreamPathTemplate: '/api/{everything}',
        },
      ],
      pools: POOLS,
    });

    const error = captureError(() => loadGatewayConfig({ GATEWAY_CONFIG_PATH: file }));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError && error.code).toBe('INVALID_ROUTE_TABLE');
  });

  it('should reject a pool without hosts', async () => {
    const file = await writeConfig({
      routes: [
        {
          upstreamPathTemplate: '/api/{everything}',
          upstreamMethods: ['GET'],
          pool: 'default',
          downstreamPathTemplate: '/api/{everything}',
        },
      ],
      pools: { ...POOLS, reader: [] },
    });

    const error = captureError(() => loadGatewayConfig({ GATEWAY_CONFIG_PATH: file }));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError && error.code).toBe('INVALID_GATEWAY_CONFIG');
  });

  it('should report a missing file', () => {
    expect(() =>
      loadGatewayConfig({ GATEWAY_CONFIG_PATH: path.join(directory, 'missing.json') })
    ).toThrow(/Cannot read gateway configuration/);
  });
});
