import type { OidcClient } from '@opcore/shared';
import { RedirectUriError } from '../errors/session-errors.js';

export type RedirectUriType = 'redirect_uri' | 'post_logout_redirect_uri';

interface SplitUri {
  base: string;
  query: Map<string, string[]>;
}

function splitUri(uri: string): SplitUri {
  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    throw new RedirectUriError(`Not an absolute URI: ${uri}`);
  }

  if (url.hash) {
    throw new RedirectUriError('Redirect URI contains a fragment');
  }

  const query = new Map<string, string[]>();
  for (const [key, value] of url.searchParams) {
    query.set(key, [...(query.get(key) ?? []), value]);
  }

  return { base: `${url.protocol}//${url.host}${url.pathname}`, query };
}

function registeredUris(client: OidcClient, uriType: RedirectUriType): string[] {
  return (uriType === 'redirect_uri' ? client.redirectUris : client.postLogoutRedirectUris) ?? [];
}

/**
 * Every value of every parameter in `subset` is present in `superset`
 */
function queryCovered(subset: Map<string, string[]>, superset: Map<string, string[]>): boolean {
  for (const [key, values] of subset) {
    const available = superset.get(key);
    if (!available || !values.every((value) => available.includes(value))) {
      return false;
    }
  }
  return true;
}

/**
 * Check a requested URI against a client's registrations. Scheme, host
 * and path must match exactly; the query must carry exactly the
 * registered parameters and values, no more and no fewer. Fragments are
 * never accepted.
 */
export function verifyUri(client: OidcClient, uri: string, uriType: RedirectUriType = 'redirect_uri'): void {
  const requested = splitUri(uri);
  const registered = registeredUris(client, uriType);

  if (registered.length === 0) {
    throw new RedirectUriError(`No registered ${uriType}`);
  }

  for (const candidate of registered) {
    const { base, query } = splitUri(candidate);
    if (base !== requested.base) {
      continue;
    }
    if (!queryCovered(query, requested.query)) {
      throw new RedirectUriError(`${uriType} is missing registered query parameters`);
    }
    if (!queryCovered(requested.query, query)) {
      throw new RedirectUriError(`${uriType} has unregistered query parameters`);
    }
    return;
  }

  throw new RedirectUriError(`${uriType} does not match any registered URI`);
}

/**
 * The URI to use: the requested one once verified, otherwise the only
 * registered one
 */
export function getUri(client: OidcClient, requested: string | undefined, uriType: RedirectUriType = 'redirect_uri'): string {
  if (requested !== undefined) {
    verifyUri(client, requested, uriType);
    return requested;
  }

  const registered = registeredUris(client, uriType);
  const [only] = registered;
  if (only === undefined) {
    throw new RedirectUriError(`Missing ${uriType} and none registered`);
  }
  if (registered.length > 1) {
    throw new RedirectUriError(`Missing ${uriType} and more than one registered`);
  }
  return only;
}
