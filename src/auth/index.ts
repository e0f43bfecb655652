/**
 * Credentials for the WAPI Basic authentication scheme.
 * @module auth
 */

/**
 * Secret string wrapper to prevent accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  /**
   * True when the wrapped value is the empty string.
   */
  isEmpty(): boolean {
    return this.value.length === 0;
  }

  toString(): string {
    return '***';
  }

  toJSON(): string {
    return '***';
  }
}

/**
 * Appliance user credentials.
 */
export interface BasicAuthCredentials {
  /** Appliance user name. */
  username: string;
  /** Appliance user password. */
  password: SecretString;
}

/**
 * Builds the `Authorization` header value for HTTP Basic authentication.
 */
export function basicAuthHeader(credentials: BasicAuthCredentials): string {
  const encoded = Buffer.from(
    `${credentials.username}:${credentials.password.expose()}`,
    'utf8'
  ).toString('base64');
  return `Basic ${encoded}`;
}

/**
 * Value shown in place of the credential in logs.
 */
export const REDACTED_AUTH_HEADER = 'Basic ***';
