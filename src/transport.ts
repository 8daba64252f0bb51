import FormData from 'form-data';
import type { Response } from 'node-fetch';
import type { z } from 'zod';

import { AUTHORIZATION } from './auth.js';
import type { ClientConfig } from './config.js';
import {
  ApiError,
  DecodeError,
  RequestBuildError,
  TransportError,
  TransportTimeoutError,
  messageOf,
} from './errors.js';
import type { LocalFile } from './source.js';

export const FORM_URLENCODED = 'application/x-www-form-urlencoded';

export type QueryParams = Record<string, string | undefined>;

export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: FormData;
}

export function buildEndpoint(base: string, path: string, params: QueryParams = {}): string {
  let url: URL;
  try {
    url = new URL(`${base.replace(/\/$/, '')}/${path.replace(/^\//, '')}`);
  } catch (error) {
    throw new RequestBuildError(`cannot build request url from ${base} and ${path}`, { cause: error });
  }
  for (const [name, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.set(name, value);
    }
  }
  return url.toString();
}

/**
 * Streams `file` under `field` next to the literal `fields`. The content type
 * always carries the writer's boundary.
 */
export function multipartBody(
  field: string,
  file: LocalFile,
  fields: QueryParams = {},
): Pick<HttpRequest, 'headers' | 'body'> {
  const form = new FormData();
  // form-data reads a knownLength of 0 as unknown, so an empty file goes in as an empty buffer.
  const content = file.size === 0 ? Buffer.alloc(0) : file.stream();
  form.append(field, content, { filename: file.name, knownLength: file.size });
  for (const [name, value] of Object.entries(fields)) {
    if (value !== undefined) {
      form.append(name, value);
    }
  }

  let length: number;
  try {
    length = form.getLengthSync();
  } catch (error) {
    throw new RequestBuildError(`cannot size multipart body for ${file.path}: ${messageOf(error)}`, { cause: error });
  }
  return {
    headers: {
      'Content-Type': `multipart/form-data; boundary=${form.getBoundary()}`,
      'Content-Length': String(length),
    },
    body: form,
  };
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/** Sends one request on a fresh connection and returns the body of a 2xx response. */
export async function execute(request: HttpRequest, authorization: string, config: ClientConfig): Promise<string> {
  const { timeoutMs } = config;
  const controller = new AbortController();
  const timeout = timeoutMs === undefined ? undefined : setTimeout(() => controller.abort(), timeoutMs);

  let response: Response;
  let text: string;
  try {
    response = await config.fetchImpl(request.url, {
      method: request.method,
      headers: {
        ...request.headers,
        [AUTHORIZATION]: authorization,
        Connection: 'close',
      },
      body: request.body,
      signal: controller.signal,
    });
    text = await response.text();
  } catch (error) {
    if (timeoutMs !== undefined && isAbortError(error)) {
      throw new TransportTimeoutError(timeoutMs, { cause: error });
    }
    throw new TransportError(`${request.method} ${request.url} failed: ${messageOf(error)}`, { cause: error });
  } finally {
    clearTimeout(timeout);
  }

  if (!response.ok) {
    throw new ApiError(response.status, text);
  }
  return text;
}

export function decodeJson<S extends z.ZodTypeAny>(text: string, schema: S): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new DecodeError(`response is not valid JSON: ${messageOf(error)}`, { cause: error });
  }
  return validate(json, schema);
}

export function validate<S extends z.ZodTypeAny>(value: unknown, schema: S): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
    throw new DecodeError(`unexpected response shape: ${detail}`, { cause: parsed.error });
  }
  return parsed.data;
}
