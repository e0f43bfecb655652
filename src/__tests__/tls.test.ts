/**
 * Tests for trust store loading and the SNI-less TLS connector.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import type { Socket } from 'net';
import { tmpdir } from 'os';
import { join } from 'path';
import * as tls from 'tls';
import forge from 'node-forge';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { SecretString } from '../auth/index.js';
import { SecurityInitError } from '../errors/index.js';
import {
  RESOURCES_DIR,
  createSniDisabledConnector,
  loadTrustStore,
  resolveTrustStorePath,
  tlsConnectionOptions,
  type TrustSettings,
} from '../transport/tls.js';
import { selfSignedCertificate } from './helpers/certificates.js';

function pkcs12(certs: forge.pki.Certificate[], password: string): Buffer {
  const asn1 = forge.pkcs12.toPkcs12Asn1(null, certs, password, { algorithm: '3des' });
  return Buffer.from(forge.asn1.toDer(asn1).getBytes(), 'binary');
}

describe('resolveTrustStorePath', () => {
  it('should resolve classpath paths inside the resources directory', () => {
    expect(resolveTrustStorePath('classpath:certs/cacerts.p12')).toEqual({
      file: join(RESOURCES_DIR, 'certs/cacerts.p12'),
      bundled: true,
    });
  });

  it('should keep other paths as they are', () => {
    expect(resolveTrustStorePath('/etc/infoblox/cacerts.p12')).toEqual({
      file: '/etc/infoblox/cacerts.p12',
      bundled: false,
    });
  });
});

describe('tlsConnectionOptions', () => {
  it('should pin TLS 1.2 and verify against the CA list', () => {
    const options = tlsConnectionOptions({ verify: true, ca: ['pem'] });

    expect(options.minVersion).toBe('TLSv1.2');
    expect(options.maxVersion).toBe('TLSv1.2');
    expect(options.ca).toEqual(['pem']);
    expect(options.rejectUnauthorized).toBe(true);
    expect(options.servername).toBeUndefined();
  });

  it('should trust every certificate and host when verification is off', () => {
    const options = tlsConnectionOptions({ verify: false });

    expect(options.rejectUnauthorized).toBe(false);
    expect(options.ca).toBeUndefined();
  });
});

describe('TLS with a local server', () => {
  const server = selfSignedCertificate('Test Appliance');
  const stranger = selfSignedCertificate('Test Stranger');
  let dir: string;
  let tlsServer: tls.Server;
  let port: number;
  const seen: Array<{ servername: unknown; protocol: string | null }> = [];

  beforeAll(async () => {
    dir = mkdtempSync(join(tmpdir(), 'infoblox-tls-'));
    tlsServer = tls.createServer({ key: server.keyPem, cert: server.certPem }, (socket) => {
      seen.push({ servername: socket.servername, protocol: socket.getProtocol() });
      socket.on('error', () => undefined);
      socket.end();
    });
    await new Promise<void>((resolve) => tlsServer.listen(0, '127.0.0.1', resolve));
    const address = tlsServer.address();
    port = typeof address === 'object' && address !== null ? address.port : 0;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => tlsServer.close(() => resolve()));
    rmSync(dir, { recursive: true, force: true });
  });

  function connect(trust: TrustSettings): Promise<Socket> {
    const connector = createSniDisabledConnector(trust, 5000);
    return new Promise((resolve, reject) => {
      connector({ hostname: '127.0.0.1', protocol: 'https:', port: String(port) }, (error, socket) => {
        if (error) {
          reject(error);
        } else if (socket) {
          resolve(socket);
        }
      });
    });
  }

  it('should load the certificates of a PKCS#12 trust store', () => {
    const file = join(dir, 'cacerts.p12');
    writeFileSync(file, pkcs12([server.cert], 'test-secret'));

    const ca = loadTrustStore(file, new SecretString('test-secret'));

    expect(ca).toEqual([server.certPem]);
  });

  it('should reject a trust store with the wrong password', () => {
    const file = join(dir, 'locked.p12');
    writeFileSync(file, pkcs12([server.cert], 'test-secret'));

    expect(() => loadTrustStore(file, new SecretString('wrong-secret'))).toThrow(SecurityInitError);
  });

  it('should reject a file that is not PKCS#12', () => {
    const file = join(dir, 'garbage.p12');
    writeFileSync(file, 'not a key store');

    expect(() => loadTrustStore(file, new SecretString('test-secret'))).toThrow(SecurityInitError);
  });

  it('should handshake TLS 1.2 without SNI against a trusted CA', async () => {
    const socket = await connect({ verify: true, ca: [server.certPem] });
    socket.destroy();

    await new Promise((resolve) => setTimeout(resolve, 50));
    const last = seen[seen.length - 1];
    expect(last?.protocol).toBe('TLSv1.2');
    expect(last?.servername).toBeFalsy();
  });

  it('should refuse a server whose CA is not trusted', async () => {
    await expect(connect({ verify: true, ca: [stranger.certPem] })).rejects.toThrow();
  });

  it('should accept any server when verification is off', async () => {
    const socket = await connect({ verify: false });
    expect(socket).toBeDefined();
    socket.destroy();
  });
});
