/**
 * Configuration for the Infoblox client.
 * @module config
 */

import { z } from 'zod';
import { SecretString } from '../auth/index.js';
import { ConfigurationError } from '../errors/index.js';

/** Default WAPI version. Browse to https://<appliance>/wapidoc/ for the versions it serves. */
export const DEFAULT_WAPI_VERSION = 'v2.5';

/** Default DNS view. */
export const DEFAULT_DNS_VIEW = 'default';

/** Default record TTL in seconds. */
export const DEFAULT_TTL = 60;

/** Default connect/read timeout in seconds. */
export const DEFAULT_TIMEOUT_SECS = 30;

/** Largest TTL the appliance accepts (unsigned 32-bit). */
export const MAX_TTL = 4294967295;

/**
 * Infoblox client configuration.
 */
export interface InfobloxConfig {
  /** Appliance management address, with or without scheme. */
  readonly endpoint: string;
  /** WAPI version, e.g. "v2.5". */
  readonly wapiVersion: string;
  /** Appliance user name. */
  readonly username: string;
  /** Appliance user password. */
  readonly password: SecretString;
  /** DNS view new records are created in. */
  readonly dnsView: string;
  /**
   * TTL in seconds applied to new records. Zero means the record is not cached.
   * The appliance only honours it together with `use_ttl: true`.
   */
  readonly ttl: number;
  /** Verify the appliance certificate against `trustStore`. */
  readonly tlsVerify: boolean;
  /**
   * PKCS#12 file holding the trusted CA certificates. A `classpath:` prefix
   * loads it from the package `resources/` directory. Required when `tlsVerify` is on.
   */
  readonly trustStore?: string;
  /** Trust store password. Required when `tlsVerify` is on. */
  readonly trustStorePassword?: SecretString;
  /** Connect, header and body timeout in seconds. */
  readonly timeoutSecs: number;
  /** Log every exchange as a curl command. */
  readonly debug: boolean;
  /** Upper bound on pages fetched by one paged query. Unbounded when unset. */
  readonly maxPages?: number;
}

const secretSchema = z
  .instanceof(SecretString)
  .refine((s) => !s.isEmpty(), { message: 'must not be empty' });

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  endpoint: z.string().trim().min(1),
  wapiVersion: z.string().regex(/^v\d+(\.\d+)*$/, 'must look like v2.5'),
  username: z.string().min(1),
  password: secretSchema,
  dnsView: z.string().min(1),
  ttl: z.number().int().min(0).max(MAX_TTL),
  tlsVerify: z.boolean(),
  trustStore: z.string().min(1).optional(),
  trustStorePassword: z.instanceof(SecretString).optional(),
  timeoutSecs: z.number().int().positive(),
  debug: z.boolean(),
  maxPages: z.number().int().positive().optional(),
});

type MutableConfig = {
  -readonly [K in keyof InfobloxConfig]: InfobloxConfig[K];
};

/**
 * Creates the default configuration. Endpoint and credentials are left empty
 * and must be supplied before `build()`.
 */
export function createDefaultConfig(): MutableConfig {
  return {
    endpoint: '',
    wapiVersion: DEFAULT_WAPI_VERSION,
    username: '',
    password: new SecretString(''),
    dnsView: DEFAULT_DNS_VIEW,
    ttl: DEFAULT_TTL,
    tlsVerify: true,
    timeoutSecs: DEFAULT_TIMEOUT_SECS,
    debug: false,
  };
}

/**
 * Validates a configuration.
 * @throws {ConfigurationError} If the configuration is invalid.
 */
export function validateConfig(config: InfobloxConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`);
  }

  // Trust-store properties are only needed when certificates are verified.
  if (config.tlsVerify) {
    if (!config.trustStore) {
      throw ConfigurationError.emptyField('Truststore path');
    }
    if (!config.trustStorePassword) {
      throw ConfigurationError.emptyField('Truststore password');
    }
  }
}

/**
 * Returns the WAPI base URL, e.g. `https://10.1.2.3/wapi/`.
 */
export function baseUrl(config: Pick<InfobloxConfig, 'endpoint'>): string {
  const endpoint = config.endpoint.trim().replace(/\/+$/, '');
  const scheme = endpoint.toLowerCase().startsWith('http') ? '' : 'https://';
  return `${scheme}${endpoint}/wapi/`;
}

/**
 * Builder for InfobloxConfig.
 */
export class InfobloxConfigBuilder {
  private config: MutableConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  /**
   * Sets the appliance management address.
   */
  endpoint(endpoint: string): this {
    this.config.endpoint = endpoint;
    return this;
  }

  /**
   * Sets the WAPI version.
   */
  wapiVersion(version: string): this {
    this.config.wapiVersion = version;
    return this;
  }

  /**
   * Sets the user name and password.
   */
  credentials(username: string, password: string): this {
    this.config.username = username;
    this.config.password = new SecretString(password);
    return this;
  }

  username(username: string): this {
    this.config.username = username;
    return this;
  }

  password(password: string): this {
    this.config.password = new SecretString(password);
    return this;
  }

  dnsView(view: string): this {
    this.config.dnsView = view;
    return this;
  }

  /**
   * Sets the TTL, in seconds, applied to created records.
   */
  ttl(ttl: number): this {
    this.config.ttl = ttl;
    return this;
  }

  /**
   * Enables or disables certificate verification.
   * Disabling it trusts every certificate and host.
   */
  tlsVerify(enabled: boolean): this {
    this.config.tlsVerify = enabled;
    return this;
  }

  /**
   * Sets the PKCS#12 trust store path and password.
   */
  trustStore(path: string, password: string): this {
    this.config.trustStore = path;
    this.config.trustStorePassword = new SecretString(password);
    return this;
  }

  /**
   * Sets the timeout in seconds.
   */
  timeout(seconds: number): this {
    this.config.timeoutSecs = seconds;
    return this;
  }

  debug(enabled: boolean): this {
    this.config.debug = enabled;
    return this;
  }

  /**
   * Bounds the number of pages a paged query may fetch.
   */
  maxPages(pages: number): this {
    this.config.maxPages = pages;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  build(): InfobloxConfig {
    const config: InfobloxConfig = { ...this.config };
    validateConfig(config);
    return Object.freeze(config);
  }
}

function parseIntEnv(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Creates an Infoblox configuration builder from environment variables.
 *
 * Environment variables:
 * - INFOBLOX_ENDPOINT: Appliance address
 * - INFOBLOX_WAPI_VERSION: WAPI version
 * - INFOBLOX_USERNAME / INFOBLOX_PASSWORD: Credentials
 * - INFOBLOX_DNS_VIEW: DNS view
 * - INFOBLOX_TTL: Record TTL in seconds
 * - INFOBLOX_TLS_VERIFY: Verify certificates (true/false)
 * - INFOBLOX_TRUST_STORE / INFOBLOX_TRUST_STORE_PASSWORD: PKCS#12 trust store
 * - INFOBLOX_TIMEOUT_SECS: Timeout in seconds
 * - INFOBLOX_DEBUG: Curl logging (true/false)
 * - INFOBLOX_MAX_PAGES: Page bound for paged queries
 */
export function createConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): InfobloxConfigBuilder {
  const builder = new InfobloxConfigBuilder();

  if (env.INFOBLOX_ENDPOINT) builder.endpoint(env.INFOBLOX_ENDPOINT);
  if (env.INFOBLOX_WAPI_VERSION) builder.wapiVersion(env.INFOBLOX_WAPI_VERSION);
  if (env.INFOBLOX_USERNAME) builder.username(env.INFOBLOX_USERNAME);
  if (env.INFOBLOX_PASSWORD) builder.password(env.INFOBLOX_PASSWORD);
  if (env.INFOBLOX_DNS_VIEW) builder.dnsView(env.INFOBLOX_DNS_VIEW);

  const ttl = parseIntEnv(env.INFOBLOX_TTL);
  if (ttl !== undefined) builder.ttl(ttl);

  if (env.INFOBLOX_TLS_VERIFY !== undefined) {
    builder.tlsVerify(env.INFOBLOX_TLS_VERIFY.toLowerCase() === 'true');
  }

  if (env.INFOBLOX_TRUST_STORE && env.INFOBLOX_TRUST_STORE_PASSWORD) {
    builder.trustStore(env.INFOBLOX_TRUST_STORE, env.INFOBLOX_TRUST_STORE_PASSWORD);
  }

  const timeout = parseIntEnv(env.INFOBLOX_TIMEOUT_SECS);
  if (timeout !== undefined) builder.timeout(timeout);

  if (env.INFOBLOX_DEBUG !== undefined) {
    builder.debug(env.INFOBLOX_DEBUG.toLowerCase() === 'true');
  }

  const maxPages = parseIntEnv(env.INFOBLOX_MAX_PAGES);
  if (maxPages !== undefined) builder.maxPages(maxPages);

  return builder;
}

/**
 * Namespace for InfobloxConfig-related utilities.
 */
export namespace InfobloxConfig {
  export function builder(): InfobloxConfigBuilder {
    return new InfobloxConfigBuilder();
  }

  export function fromEnv(env?: Record<string, string | undefined>): InfobloxConfigBuilder {
    return createConfigFromEnv(env);
  }

  export function validate(config: InfobloxConfig): void {
    validateConfig(config);
  }
}
