/**
 * Executes a single WAPI call and turns the response into a typed result or
 * an error.
 *
 * @module client/executor
 */

import { z } from 'zod';
import {
  ApiError,
  DeserializationError,
  InfobloxError,
  TransportError,
} from '../errors/index.js';
import type { HttpResponse, HttpTransport, WapiRequest } from '../transport/index.js';
import { resultEnvelope, type ResultEnvelope } from '../types/index.js';

const JSON_CONTENT_TYPE = 'application/json';

const envelopeSchema = resultEnvelope(z.unknown());

const errorBodySchema = z
  .object({
    Error: z.string().optional(),
    code: z.string().optional(),
    text: z.string().optional(),
  })
  .passthrough();

/**
 * True when the media type of the response is `application/json`,
 * ignoring parameters such as `charset`.
 */
export function isJsonResponse(response: HttpResponse): boolean {
  const contentType = response.headers['content-type'];
  if (!contentType) {
    return false;
  }
  const [mediaType = ''] = contentType.split(';');
  return mediaType.trim().toLowerCase() === JSON_CONTENT_TYPE;
}

function parseJson(text: string): unknown {
  return JSON.parse(text);
}

/**
 * Maps a non-2xx response to the error it represents.
 */
export function errorFromResponse(response: HttpResponse): InfobloxError {
  if (isJsonResponse(response)) {
    let parsed: unknown;
    try {
      parsed = parseJson(response.body);
    } catch {
      return TransportError.fromStatus(response.status, response.statusText);
    }
    const body = errorBodySchema.safeParse(parsed);
    if (body.success) {
      return ApiError.fromBody(response.status, response.statusText, body.data);
    }
  }
  return TransportError.fromStatus(response.status, response.statusText);
}

/**
 * Sends calls through a transport and decodes `{ result }` envelopes.
 */
export class CallExecutor {
  constructor(private readonly transport: HttpTransport) {}

  /**
   * Executes a call and returns the decoded `result`.
   */
  async execute<S extends z.ZodTypeAny>(call: WapiRequest, schema: S): Promise<z.output<S>> {
    const envelope = await this.executeEnvelope(call, schema);
    return envelope.result;
  }

  /**
   * Executes a call and returns the whole envelope, including `next_page_id`.
   */
  async executeEnvelope<S extends z.ZodTypeAny>(
    call: WapiRequest,
    schema: S
  ): Promise<ResultEnvelope<z.output<S>>> {
    const response = await this.send(call);

    if (response.status < 200 || response.status >= 300) {
      throw errorFromResponse(response);
    }

    let json: unknown;
    try {
      json = parseJson(response.body);
    } catch (error) {
      throw new DeserializationError(
        `Response of ${call.method} ${call.path} is not valid JSON`,
        error
      );
    }

    const envelope = envelopeSchema.safeParse(json);
    if (!envelope.success) {
      throw new DeserializationError(
        `Response of ${call.method} ${call.path} is not a result envelope`,
        envelope.error
      );
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new DeserializationError(
        `Unexpected result of ${call.method} ${call.path}: ${result.error.issues
          .map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`)
          .join(', ')}`,
        result.error
      );
    }

    return { result: result.data, next_page_id: envelope.data.next_page_id };
  }

  private async send(call: WapiRequest): Promise<HttpResponse> {
    try {
      return await this.transport.send(call);
    } catch (error) {
      if (error instanceof InfobloxError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Transport failure: ${detail}`, { cause: error });
    }
  }
}
