import * as jose from 'jose';
import type { OidcClient } from '@opcore/shared';
import type { Clock } from '../session/clock.js';
import type { Logger } from '../logging/logger.js';
import { PushedAuthorizations } from './par.js';
import { verifyClientJwt } from '../crypto/jwt.js';
import { toParameter } from '../utils/params.js';
import { OAuthError } from '../errors/oauth-error.js';
import { ServiceError } from '../errors/session-errors.js';
import { SUPPORTED_SIGNING_ALGORITHMS, DEFAULT_BACKCHANNEL_TIMEOUT_MS } from '../config/constants.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RequestObjectOptions {
  par: PushedAuthorizations;
  clock: Clock;
  logger: Logger;
  fetch?: FetchLike;
  timeoutMs?: number;
  /** Algorithms accepted when the client registered none */
  allowedAlgorithms?: readonly string[];
  /** When set, an `aud` in a request object must name this issuer */
  issuer?: string;
}

/**
 * Expands `request` and `request_uri` into plain authorization request
 * parameters.
 * OpenID Connect Core 1.0 Section 6, RFC 9126
 */
export class RequestObjectResolver {
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly allowedAlgorithms: readonly string[];

  constructor(private readonly options: RequestObjectOptions) {
    this.fetchFn = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BACKCHANNEL_TIMEOUT_MS;
    this.allowedAlgorithms = options.allowedAlgorithms ?? SUPPORTED_SIGNING_ALGORITHMS;
  }

  /**
   * Parameters with any pushed or signed request folded in. Values from
   * a signed request object overwrite the unprotected ones.
   */
  async resolve(params: Record<string, string>, client: OidcClient): Promise<Record<string, string>> {
    const { request_uri: requestUri, request, ...rest } = params;

    if (requestUri !== undefined && request !== undefined) {
      throw OAuthError.invalidRequest('request and request_uri can not both be used');
    }

    if (requestUri !== undefined) {
      if (PushedAuthorizations.isRequestUri(requestUri)) {
        const pushed = await this.options.par.resolve(requestUri);
        return { ...pushed, ...rest, client_id: client.clientId };
      }
      const fetched = await this.fetchRequestObject(requestUri, client);
      return this.merge(rest, await this.verify(fetched, client));
    }

    if (request !== undefined) {
      return this.merge(rest, await this.verify(request, client));
    }

    return params;
  }

  private merge(params: Record<string, string>, claims: jose.JWTPayload): Record<string, string> {
    const merged: Record<string, string> = { ...params };
    for (const [name, value] of Object.entries(claims)) {
      if (['iss', 'aud', 'exp', 'iat', 'nbf', 'jti'].includes(name) || value === undefined) {
        continue;
      }
      merged[name] = toParameter(name, value);
    }
    return merged;
  }

  private async verify(token: string, client: OidcClient): Promise<jose.JWTPayload> {
    if (!client.jwks) {
      throw OAuthError.invalidRequestObject('Client has no registered keys');
    }

    const algorithms = client.requestObjectSigningAlg ? [client.requestObjectSigningAlg] : [...this.allowedAlgorithms];

    let payload: jose.JWTPayload;
    try {
      payload = await verifyClientJwt(
        token,
        { keys: client.jwks.keys.map((key) => ({ ...key })) },
        { algorithms, currentDate: new Date(this.options.clock.now() * 1000) }
      );
    } catch (error) {
      this.options.logger.warn('Request object rejected', { clientId: client.clientId, error });
      throw OAuthError.invalidRequestObject('Request object could not be verified');
    }

    if (payload.iss !== undefined && payload.iss !== client.clientId) {
      throw OAuthError.invalidRequestObject('Request object issuer is not the client');
    }
    if (payload['client_id'] !== undefined && payload['client_id'] !== client.clientId) {
      throw OAuthError.invalidRequestObject('Request object client_id does not match');
    }
    const { issuer } = this.options;
    if (payload.aud !== undefined && issuer !== undefined) {
      const audience = Array.isArray(payload.aud) ? payload.aud : [payload.aud];
      if (!audience.includes(issuer)) {
        throw OAuthError.invalidRequestObject('Request object is not addressed to this provider');
      }
    }

    return payload;
  }

  private async fetchRequestObject(requestUri: string, client: OidcClient): Promise<string> {
    const [withoutFragment = requestUri] = requestUri.split('#');
    const registered = client.requestUris ?? [];
    if (registered.length > 0 && !registered.some((uri) => uri.split('#')[0] === withoutFragment)) {
      throw OAuthError.invalidRequestUri('A request_uri outside the registered');
    }

    let response: Response;
    try {
      response = await this.fetchFn(requestUri, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      throw new ServiceError(`Could not fetch request_uri: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (response.status !== 200) {
      throw new ServiceError(`Got a ${response.status} response from request_uri`);
    }
    return (await response.text()).trim();
  }
}
