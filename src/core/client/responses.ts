import { gunzipSync } from 'node:zlib';
import type { HttpResponse } from '../../ports/HttpTransportPort.js';
import type { JsonValue } from '../../ports/WeatherPort.js';
import {
  AccessLimitationError,
  ApiError,
  AuthenticationError,
  BadRequestError,
  NotFoundError,
  ServerError,
  TransportError,
} from '../../utils/errors.js';

const decoder = new TextDecoder('utf-8', { fatal: true });

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/** Non-2xx status to its error category. */
export function errorForStatus(status: number, providerMessage?: string): ApiError {
  const details = { status, providerMessage };
  const suffix = providerMessage ? `: ${providerMessage}` : '';

  if (status === 401) {
    return new AuthenticationError(`Invalid or missing API key (HTTP 401)${suffix}`, details);
  }
  if (status === 403 || status === 429) {
    return new AccessLimitationError(`Access limited by the provider (HTTP ${status})${suffix}`, details);
  }
  if (status === 404) {
    return new NotFoundError(`Location not found (HTTP 404)${suffix}`, details);
  }
  if (status >= 400 && status < 500) {
    return new BadRequestError(`Request rejected (HTTP ${status})${suffix}`, details);
  }
  if (status >= 500 && status < 600) {
    return new ServerError(`Weather provider failure (HTTP ${status})${suffix}`, details);
  }
  return new TransportError(`Unexpected HTTP status ${status}${suffix}`, details);
}

export function decodeJson(response: HttpResponse): JsonValue {
  let text: string;
  try {
    text = decoder.decode(response.body);
  } catch (error) {
    throw new TransportError('Response body is not valid UTF-8', { status: response.status }, { cause: error });
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new TransportError('Response body is not valid JSON', { status: response.status }, { cause: error });
  }
}

export function decodeGzipJson(response: HttpResponse): JsonValue {
  let inflated: Uint8Array;
  try {
    inflated = gunzipSync(response.body);
  } catch (error) {
    throw new TransportError('Response body is not valid gzip data', { status: response.status }, { cause: error });
  }
  return decodeJson({ status: response.status, body: inflated });
}

/** The `message` field of a JSON error body, if there is one. */
export function extractProviderMessage(body: Uint8Array): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder().decode(body));
  } catch {
    return undefined;
  }

  if (typeof parsed === 'object' && parsed !== null && 'message' in parsed) {
    const { message } = parsed;
    if (typeof message === 'string' && message.trim() !== '') {
      return message;
    }
  }
  return undefined;
}
