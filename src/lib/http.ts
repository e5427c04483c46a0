import { z } from 'zod';
import { HttpError } from './errors.js';
import { logVerbose } from './utils/log.js';

const ErrorBodySchema = z
  .object({
    error_description: z.string().optional(),
    description: z.string().optional(),
    errors: z.array(z.object({ detail: z.string() })).optional(),
  })
  .passthrough();

/**
 * Pull a human readable description out of an error response body
 */
async function describeFailure(response: Response): Promise<string> {
  const text = await response.text();
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      const body = parsed.data;
      const detail =
        body.error_description ?? body.description ?? body.errors?.[0]?.detail;
      if (detail) {
        return detail;
      }
    }
  } catch {
    // Not JSON
  }
  return `Server error, status code: ${response.status}`;
}

export interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
}

/**
 * Make a request and validate the JSON body against `schema`
 */
export async function requestJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  init: RequestOptions = {}
): Promise<T> {
  logVerbose(`${init.method ?? 'GET'} ${url}`);

  const response = await fetch(url, {
    ...init,
    headers: {
      Accept: 'application/json',
      ...init.headers,
    },
  });

  logVerbose(`${response.status} ${url}`);

  if (!response.ok) {
    throw new HttpError(response.status, await describeFailure(response));
  }

  const body: unknown = await response.json();
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new Error(
      `Unexpected response from ${url}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`
    );
  }
  return parsed.data;
}
