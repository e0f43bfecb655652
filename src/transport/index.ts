/**
 * HTTP transport for WAPI calls.
 *
 * Every request carries Basic credentials, a JSON content type and the
 * `_return_as_object=1` parameter, and is sent over a TLS 1.2 socket opened
 * without SNI.
 *
 * @module transport
 */

import { Agent, fetch, type Dispatcher } from 'undici';
import { basicAuthHeader, type BasicAuthCredentials } from '../auth/index.js';
import { baseUrl, type InfobloxConfig } from '../config/index.js';
import {
  ConfigurationError,
  InfobloxError,
  SecurityInitError,
  TransportError,
} from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { toCurl } from './curl.js';
import { createSniDisabledConnector, loadTrustStore, type TrustSettings } from './tls.js';

/**
 * HTTP method types.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * A WAPI call before it is sent. `path` is relative to the `/wapi/` root,
 * e.g. `v2.5/record:a`.
 */
export interface WapiRequest {
  method: HttpMethod;
  path: string;
  query?: Record<string, string>;
  body?: unknown;
}

/**
 * Raw HTTP response. Header names are lower-cased.
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}

/**
 * Sends WAPI requests. Implemented by `UndiciTransport` and by test doubles.
 */
export interface HttpTransport {
  send(request: WapiRequest): Promise<HttpResponse>;
  close(): Promise<void>;
}

/** Query parameter asking WAPI to wrap every result in `{ result }`. */
export const RETURN_AS_OBJECT_PARAM = '_return_as_object';

export interface UndiciTransportOptions {
  /** WAPI root, e.g. `https://10.1.2.3/wapi/`. */
  baseUrl: string;
  credentials: BasicAuthCredentials;
  timeoutMs: number;
  /**
   * Certificate checks for the connection pool. Also decides whether the
   * curl debug line carries `-k`.
   */
  trust: TrustSettings;
  /** Log each exchange as a curl command. */
  debug?: boolean;
  logger?: Logger;
  /** Replaces the connection pool, e.g. with a `MockAgent`. */
  dispatcher?: Dispatcher;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

const TIMEOUT_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

/**
 * Transport backed by undici `fetch`.
 */
export class UndiciTransport implements HttpTransport {
  private readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly insecure: boolean;
  private readonly debug: boolean;
  private readonly logger: Logger;

  constructor(options: UndiciTransportOptions) {
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`;
    this.authHeader = basicAuthHeader(options.credentials);
    this.timeoutMs = options.timeoutMs;
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? new NoopLogger();
    this.insecure = !options.trust.verify;

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({
        connect: createSniDisabledConnector(options.trust, options.timeoutMs),
        headersTimeout: options.timeoutMs,
        bodyTimeout: options.timeoutMs,
      });
      this.ownsDispatcher = true;
    }
  }

  /**
   * Builds the absolute URL of a call, including `_return_as_object=1`.
   */
  buildUrl(path: string, query?: Record<string, string>): string {
    const url = new URL(`${this.baseUrl}${path.replace(/^\/+/, '')}`);
    for (const [name, value] of Object.entries(query ?? {})) {
      url.searchParams.append(name, value);
    }
    url.searchParams.set(RETURN_AS_OBJECT_PARAM, '1');
    return url.toString();
  }

  async send(request: WapiRequest): Promise<HttpResponse> {
    const url = this.buildUrl(request.path, request.query);
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Authorization: this.authHeader,
    };
    const body = request.body === undefined ? undefined : JSON.stringify(request.body);

    if (this.debug) {
      this.logger.info(
        toCurl(
          { method: request.method, url, headers, body },
          { flags: this.insecure ? ['-k'] : [] }
        )
      );
    }

    const started = Date.now();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        method: request.method,
        headers,
        body,
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });
      const text = await response.text();

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        responseHeaders[name.toLowerCase()] = value;
      });

      if (this.debug) {
        this.logger.info(`<-- ${response.status} ${response.statusText}`, {
          url,
          durationMs: Date.now() - started,
        });
      }

      return {
        status: response.status,
        statusText: response.statusText,
        headers: responseHeaders,
        body: text,
      };
    } catch (error) {
      throw this.toTransportError(error, controller.signal.aborted);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private toTransportError(error: unknown, aborted: boolean): TransportError {
    if (error instanceof TransportError) {
      return error;
    }
    const cause = error instanceof Error && error.cause !== undefined ? error.cause : error;
    if (aborted || TIMEOUT_CODES.has(errorCode(cause) ?? '')) {
      return TransportError.timeout(this.timeoutMs, cause);
    }
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new TransportError(`Transport failure: ${detail}`, { cause });
  }
}

/**
 * Builds the transport for a validated configuration. Loads the trust store
 * when certificate verification is on.
 *
 * @throws {SecurityInitError} If the trust store or TLS setup fails.
 */
export function createTransport(
  config: InfobloxConfig,
  logger: Logger = new NoopLogger(),
  dispatcher?: Dispatcher
): HttpTransport {
  try {
    let trust: TrustSettings;
    if (config.tlsVerify) {
      if (!config.trustStore) {
        throw ConfigurationError.emptyField('Truststore path');
      }
      if (!config.trustStorePassword) {
        throw ConfigurationError.emptyField('Truststore password');
      }
      trust = {
        verify: true,
        ca: loadTrustStore(config.trustStore, config.trustStorePassword, logger),
      };
    } else {
      logger.warn('Skipping TLS certs verification.');
      trust = { verify: false };
    }

    return new UndiciTransport({
      baseUrl: baseUrl(config),
      credentials: { username: config.username, password: config.password },
      timeoutMs: config.timeoutSecs * 1000,
      trust,
      debug: config.debug,
      logger,
      dispatcher,
    });
  } catch (error) {
    if (error instanceof InfobloxError) {
      throw error;
    }
    throw new SecurityInitError('Infoblox client init failed', error);
  }
}

export { toCurl, shellQuote } from './curl.js';
export type { CurlRequest, CurlOptions } from './curl.js';
export {
  CLASSPATH_PREFIX,
  RESOURCES_DIR,
  createSniDisabledConnector,
  loadTrustStore,
  parsePkcs12Certificates,
  resolveTrustStorePath,
  tlsConnectionOptions,
} from './tls.js';
export type { TrustSettings } from './tls.js';
