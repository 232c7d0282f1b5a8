import { ProvisioningAPIError, ProvisioningConnectionError } from '../errors.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export type RequestAuth =
  | { type: 'bearer'; token: string }
  | { type: 'basic'; username: string; password: string };

export interface RequestOptions {
  method: HttpMethod;
  path: string;
  /** JSON body */
  body?: unknown;
  /** application/x-www-form-urlencoded body; takes precedence over `body` */
  form?: Record<string, string>;
  auth?: RequestAuth;
  timeout?: number;
}

export async function request(baseUrl: string, options: RequestOptions): Promise<unknown> {
  const url = `${baseUrl}${options.path}`;

  const headers: Record<string, string> = {
    Accept: 'application/json',
  };

  if (options.auth?.type === 'bearer') {
    headers.Authorization = `Bearer ${options.auth.token}`;
  } else if (options.auth?.type === 'basic') {
    const basic = Buffer.from(`${options.auth.username}:${options.auth.password}`).toString('base64');
    headers.Authorization = `Basic ${basic}`;
  }

  let payload: string | undefined;
  if (options.form) {
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
    payload = new URLSearchParams(options.form).toString();
  } else if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    payload = JSON.stringify(options.body);
  }

  let response: Response;
  try {
    response = await fetch(url, {
      method: options.method,
      headers,
      body: payload,
      signal: options.timeout ? AbortSignal.timeout(options.timeout) : undefined,
    });
  } catch (err) {
    if (err instanceof Error && err.name === 'TimeoutError') {
      throw new ProvisioningConnectionError(`Request timed out after ${options.timeout}ms`, {
        cause: err,
      });
    }
    throw new ProvisioningConnectionError(`Failed to connect to ${baseUrl}`, { cause: err });
  }

  // 204 No Content
  if (response.status === 204) {
    return undefined;
  }

  // Parse response body
  const text = await response.text();
  let body: unknown;
  try {
    body = text ? JSON.parse(text) : undefined;
  } catch {
    body = undefined;
  }

  // Error responses
  if (!response.ok) {
    throw new ProvisioningAPIError(response.status, errorMessageOf(body) ?? (text || `HTTP ${response.status}`));
  }

  return body;
}

/** Pull a human-readable message out of an error body: `error`, `message` or `errors[0].message`. */
function errorMessageOf(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  for (const key of ['error', 'message']) {
    const value = body[key];
    if (typeof value === 'string') return value;
  }
  const errors = body.errors;
  if (Array.isArray(errors) && errors.length > 0) {
    const first: unknown = errors[0];
    if (isRecord(first) && typeof first.message === 'string') return first.message;
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
