/**
 * Renders a request as an equivalent curl command for debug logging.
 */

import { REDACTED_AUTH_HEADER } from '../auth/index.js';

export interface CurlRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface CurlOptions {
  /** Extra curl flags placed before the URL, e.g. `-k`. */
  flags?: string[];
}

/**
 * Single-quotes a shell argument.
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Returns the curl command for the request. The Authorization header is
 * always redacted.
 */
export function toCurl(request: CurlRequest, options: CurlOptions = {}): string {
  const parts: string[] = ['curl'];
  parts.push(...(options.flags ?? []));
  parts.push('-X', request.method);

  for (const [name, value] of Object.entries(request.headers)) {
    const shown = name.toLowerCase() === 'authorization' ? REDACTED_AUTH_HEADER : value;
    parts.push('-H', shellQuote(`${name}: ${shown}`));
  }

  if (request.body !== undefined) {
    parts.push('--data', shellQuote(request.body));
  }

  parts.push(shellQuote(request.url));
  return parts.join(' ');
}
