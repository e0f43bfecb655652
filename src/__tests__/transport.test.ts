/**
 * Tests for the undici transport, against an in-process MockAgent.
 */

import * as http from 'http';
import * as https from 'https';
import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import { MockAgent } from 'undici';
import { SecretString } from '../auth/index.js';
import { ConfigurationError, SecurityInitError, TransportError } from '../errors/index.js';
import { testConfig } from '../fixtures/index.js';
import type { Logger } from '../observability/logging.js';
import { UndiciTransport, createTransport, type TrustSettings } from '../transport/index.js';
import { selfSignedCertificate } from './helpers/certificates.js';

const ORIGIN = 'https://ib.example.test';
const CREDENTIALS = { username: 'test-user', password: new SecretString('test-secret') };
const AUTHORIZATION = `Basic ${Buffer.from('test-user:test-secret').toString('base64')}`;

function recordingLogger(): Logger {
  return { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('UndiciTransport', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  function transport(
    options: { debug?: boolean; logger?: Logger; trust?: TrustSettings } = {}
  ): UndiciTransport {
    return new UndiciTransport({
      baseUrl: `${ORIGIN}/wapi/`,
      credentials: CREDENTIALS,
      timeoutMs: 5000,
      trust: { verify: false },
      dispatcher: agent,
      ...options,
    });
  }

  it('should add _return_as_object and the filter to the URL', () => {
    const url = transport().buildUrl('v2.5/record:a', { 'name:': 'host.example.com' });

    expect(url).toBe(
      `${ORIGIN}/wapi/v2.5/record:a?name%3A=host.example.com&_return_as_object=1`
    );
  });

  it('should send Basic credentials and a JSON content type', async () => {
    let requestedPath = '';
    agent
      .get(ORIGIN)
      .intercept({
        path: (path: string) => {
          requestedPath = path;
          return path.startsWith('/wapi/v2.5/record:a');
        },
        method: 'GET',
        headers: {
          authorization: AUTHORIZATION,
          'content-type': 'application/json',
        },
      })
      .reply(200, { result: [] }, { headers: { 'content-type': 'application/json' } });

    const response = await transport().send({
      method: 'GET',
      path: 'v2.5/record:a',
      query: { 'name:': 'host.example.com' },
    });

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toBe('application/json');
    expect(JSON.parse(response.body)).toEqual({ result: [] });

    const url = new URL(requestedPath, ORIGIN);
    expect(url.searchParams.get('name:')).toBe('host.example.com');
    expect(url.searchParams.get('_return_as_object')).toBe('1');
  });

  it('should return error statuses without throwing', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: /^\/wapi\/v2\.5\/record:a/, method: 'DELETE' })
      .reply(500, '<html>Internal Server Error</html>', {
        headers: { 'content-type': 'text/html' },
      });

    const response = await transport().send({ method: 'DELETE', path: 'v2.5/record:a/abc' });

    expect(response.status).toBe(500);
    expect(response.headers['content-type']).toBe('text/html');
    expect(response.body).toBe('<html>Internal Server Error</html>');
  });

  it('should raise TransportError when the connection fails', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: /^\/wapi\//, method: 'GET' })
      .replyWithError(new Error('socket hang up'));

    await expect(
      transport().send({ method: 'GET', path: 'v2.5/zone_auth' })
    ).rejects.toBeInstanceOf(TransportError);
  });

  it('should log the request as curl in debug mode', async () => {
    const logger = recordingLogger();
    agent
      .get(ORIGIN)
      .intercept({ path: /^\/wapi\//, method: 'GET' })
      .reply(200, { result: [] }, { headers: { 'content-type': 'application/json' } });

    await transport({ debug: true, logger }).send({ method: 'GET', path: 'v2.5/record:a' });

    expect(logger.info).toHaveBeenNthCalledWith(
      1,
      `curl -k -X GET -H 'Content-Type: application/json' -H 'Authorization: Basic ***' '${ORIGIN}/wapi/v2.5/record:a?_return_as_object=1'`
    );
  });

  it('should leave -k out of the curl line when verification is on', async () => {
    const logger = recordingLogger();
    agent
      .get(ORIGIN)
      .intercept({ path: /^\/wapi\//, method: 'GET' })
      .reply(200, { result: [] }, { headers: { 'content-type': 'application/json' } });

    await transport({ debug: true, logger, trust: { verify: true, ca: ['pem'] } }).send({
      method: 'GET',
      path: 'v2.5/record:a',
    });

    expect(logger.info).toHaveBeenNthCalledWith(
      1,
      `curl -X GET -H 'Content-Type: application/json' -H 'Authorization: Basic ***' '${ORIGIN}/wapi/v2.5/record:a?_return_as_object=1'`
    );
  });

  it('should not log without debug mode', async () => {
    const logger = recordingLogger();
    agent
      .get(ORIGIN)
      .intercept({ path: /^\/wapi\//, method: 'GET' })
      .reply(200, { result: [] }, { headers: { 'content-type': 'application/json' } });

    await transport({ logger }).send({ method: 'GET', path: 'v2.5/record:a' });

    expect(logger.info).not.toHaveBeenCalled();
  });
});

function listen(server: http.Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : 0);
    });
  });
}

function shutdown(server: http.Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve) => server.close(() => resolve()));
}

describe('UndiciTransport against a self-signed appliance', () => {
  const appliance = selfSignedCertificate('Test Appliance');
  const stranger = selfSignedCertificate('Test Stranger');
  let server: https.Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = https.createServer({ key: appliance.keyPem, cert: appliance.certPem }, (_req, res) => {
      res.setHeader('content-type', 'application/json');
      res.end('{"result":[]}');
    });
    baseUrl = `https://127.0.0.1:${await listen(server)}/wapi/`;
  });

  afterAll(async () => {
    await shutdown(server);
  });

  async function status(trust: TrustSettings): Promise<number> {
    const transport = new UndiciTransport({ baseUrl, credentials: CREDENTIALS, timeoutMs: 5000, trust });
    try {
      const response = await transport.send({ method: 'GET', path: 'v2.5/zone_auth' });
      return response.status;
    } finally {
      await transport.close();
    }
  }

  it('should refuse the server when its certificate is not in the trust store', async () => {
    await expect(status({ verify: true, ca: [stranger.certPem] })).rejects.toThrow(
      /^Transport failure: /
    );
    await expect(status({ verify: true, ca: [stranger.certPem] })).rejects.toBeInstanceOf(
      TransportError
    );
  });

  it('should accept the server when its certificate is in the trust store', async () => {
    await expect(status({ verify: true, ca: [appliance.certPem] })).resolves.toBe(200);
  });

  it('should accept an untrusted server when verification is off', async () => {
    await expect(status({ verify: false })).resolves.toBe(200);
  });
});

describe('UndiciTransport timeouts', () => {
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = http.createServer(() => {
      // never answers
    });
    baseUrl = `http://127.0.0.1:${await listen(server)}/wapi/`;
  });

  afterAll(async () => {
    await shutdown(server);
  });

  it('should raise TransportError when the appliance does not answer in time', async () => {
    const transport = new UndiciTransport({
      baseUrl,
      credentials: CREDENTIALS,
      timeoutMs: 300,
      trust: { verify: false },
    });

    try {
      const failure = transport.send({ method: 'GET', path: 'v2.5/zone_auth' });
      await expect(failure).rejects.toBeInstanceOf(TransportError);
      await expect(failure).rejects.toThrow('Request timeout after 300ms');
    } finally {
      await transport.close();
    }
  });
});

describe('createTransport', () => {
  it('should build without a trust store when verification is off', async () => {
    const logger = recordingLogger();
    const transport = createTransport(testConfig(), logger);

    expect(logger.warn).toHaveBeenCalledWith('Skipping TLS certs verification.');
    await transport.close();
  });

  it('should require a trust store when verification is on', () => {
    expect(() => createTransport(testConfig({ tlsVerify: true }))).toThrow(ConfigurationError);
  });

  it('should fail to build when the trust store is missing', () => {
    const config = testConfig({
      tlsVerify: true,
      trustStore: '/nonexistent/cacerts.p12',
      trustStorePassword: new SecretString('test-secret'),
    });

    expect(() => createTransport(config)).toThrow(SecurityInitError);
    expect(() => createTransport(config)).toThrow(
      "Can't find the trustStore: /nonexistent/cacerts.p12"
    );
  });
});
