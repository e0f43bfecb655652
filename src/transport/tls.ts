/**
 * TLS setup for the appliance connection.
 *
 * The appliance does not support the SNI extension, so sockets are opened
 * with `tls.connect` and no `servername`. Only TLS 1.2 is negotiated.
 */

import { readFileSync } from 'fs';
import * as net from 'net';
import { join } from 'path';
import * as tls from 'tls';
import { fileURLToPath } from 'url';
import forge from 'node-forge';
import { errors, type buildConnector } from 'undici';
import type { SecretString } from '../auth/index.js';
import { SecurityInitError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/logging.js';

/** Prefix selecting a trust store bundled in the package `resources/` directory. */
export const CLASSPATH_PREFIX = 'classpath:';

/** Directory `classpath:` paths resolve against. */
export const RESOURCES_DIR = fileURLToPath(new URL('../../resources/', import.meta.url));

/**
 * Trust settings for the TLS connector.
 */
export type TrustSettings =
  | { verify: true; ca: string[] }
  | { verify: false };

/**
 * Resolves a trust store path to a file, honouring the `classpath:` prefix.
 */
export function resolveTrustStorePath(path: string): { file: string; bundled: boolean } {
  if (path.startsWith(CLASSPATH_PREFIX)) {
    const relative = path.slice(CLASSPATH_PREFIX.length).replace(/^\/+/, '');
    return { file: join(RESOURCES_DIR, relative), bundled: true };
  }
  return { file: path, bundled: false };
}

function readTrustStore(file: string): Buffer {
  try {
    return readFileSync(file);
  } catch (error) {
    throw new SecurityInitError(`Can't find the trustStore: ${file}`, error);
  }
}

/**
 * Parses a PKCS#12 store and returns its certificates as PEM strings.
 */
export function parsePkcs12Certificates(der: Buffer, password: SecretString): string[] {
  let pems: string[];
  try {
    const asn1 = forge.asn1.fromDer(forge.util.createBuffer(der.toString('binary')));
    const p12 = forge.pkcs12.pkcs12FromAsn1(asn1, false, password.expose());
    const certBag = forge.pki.oids.certBag;
    const bags = p12.getBags({ bagType: certBag })[certBag] ?? [];
    pems = bags.flatMap((bag) => (bag.cert ? [forge.pki.certificateToPem(bag.cert)] : []));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SecurityInitError(`Can't parse the PKCS#12 trustStore: ${reason}`, error);
  }

  if (pems.length === 0) {
    throw new SecurityInitError('The trustStore contains no certificates');
  }
  return pems;
}

/**
 * Loads the trusted CA certificates from a PKCS#12 file or bundled resource.
 */
export function loadTrustStore(
  path: string,
  password: SecretString,
  logger: Logger = new NoopLogger()
): string[] {
  const { file, bundled } = resolveTrustStorePath(path);
  logger.info('Loading the trustStore', { path: file, bundled });

  const der = readTrustStore(file);
  try {
    return parsePkcs12Certificates(der, password);
  } catch (error) {
    if (error instanceof SecurityInitError) {
      throw new SecurityInitError(`Can't load the trustStore: ${file}. ${error.message}`, error.cause);
    }
    throw error;
  }
}

/**
 * TLS options for a connection: TLS 1.2 only, and either the given CA list
 * with full verification or no verification at all.
 */
export function tlsConnectionOptions(trust: TrustSettings): tls.ConnectionOptions {
  const base: tls.ConnectionOptions = {
    minVersion: 'TLSv1.2',
    maxVersion: 'TLSv1.2',
    ALPNProtocols: ['http/1.1'],
  };

  if (trust.verify) {
    return {
      ...base,
      ca: trust.ca,
      rejectUnauthorized: true,
      checkServerIdentity: tls.checkServerIdentity,
    };
  }

  return {
    ...base,
    rejectUnauthorized: false,
    checkServerIdentity: () => undefined,
  };
}

function defaultPort(protocol: string): number {
  return protocol === 'https:' ? 443 : 80;
}

/**
 * Creates an undici connector that opens sockets without SNI.
 *
 * Plain `http:` endpoints get a TCP socket. The connect phase is bounded by
 * `timeoutMs`.
 */
export function createSniDisabledConnector(
  trust: TrustSettings,
  timeoutMs: number
): buildConnector.connector {
  const tlsOptions = tlsConnectionOptions(trust);

  return (options, callback) => {
    const host = options.hostname.replace(/^\[|\]$/g, '');
    const port = Number(options.port) || defaultPort(options.protocol);
    const secure = options.protocol === 'https:';

    // No servername: the ClientHello carries no SNI extension.
    const socket: net.Socket = secure
      ? tls.connect({ ...tlsOptions, host, port })
      : net.connect({ host, port });
    const readyEvent = secure ? 'secureConnect' : 'connect';

    const onTimeout = (): void => {
      socket.destroy(
        new errors.ConnectTimeoutError(`Connect timeout after ${timeoutMs}ms to ${host}:${port}`)
      );
    };
    const onError = (error: Error): void => {
      cleanup();
      callback(error, null);
    };
    const onReady = (): void => {
      cleanup();
      socket.setNoDelay(true);
      callback(null, socket);
    };
    const cleanup = (): void => {
      socket.setTimeout(0);
      socket.removeListener('timeout', onTimeout);
      socket.removeListener('error', onError);
      socket.removeListener(readyEvent, onReady);
    };

    socket.setTimeout(timeoutMs);
    socket.once('timeout', onTimeout);
    socket.once('error', onError);
    socket.once(readyEvent, onReady);
  };
}
