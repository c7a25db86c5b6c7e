import type { Context } from 'hono';

/**
 * String parameters of a request: the query for GET, the form body
 * otherwise. File uploads and repeated names are dropped.
 */
export async function requestParams(c: Context): Promise<Record<string, string>> {
  if (c.req.method === 'GET') {
    return c.req.query();
  }

  const body = await c.req.parseBody();
  const params: Record<string, string> = {};
  for (const [name, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      params[name] = value;
    }
  }
  return params;
}

// Parameters whose wire form is a space separated list
const SPACE_DELIMITED = new Set(['response_type', 'scope', 'prompt', 'acr_values']);

/**
 * Wire form of one authorization request value. Lists other than the
 * space separated ones, such as `resource`, become a JSON array.
 */
export function toParameter(name: string, value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value) && SPACE_DELIMITED.has(name) && value.every((item) => typeof item === 'string')) {
    return value.join(' ');
  }
  return JSON.stringify(value);
}
