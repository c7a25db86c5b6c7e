import type { ResponseMode } from '@opcore/shared';
import { OAuthError } from '../errors/oauth-error.js';
import { escapeHtml } from '../utils/html.js';
import { CONTENT_TYPE_HTML } from '../config/constants.js';

export type ResponseArgs = Record<string, string>;

export type AuthorizationResponse =
  | { kind: 'redirect'; location: string }
  | { kind: 'form_post'; contentType: typeof CONTENT_TYPE_HTML; body: string };

/**
 * Response mode to deliver with. `fragmentEncoded` is what the response
 * type demands: false for code-only and `none`, true when tokens are
 * returned from the authorization endpoint. Asking for the other one
 * is an error.
 * OAuth 2.0 Multiple Response Type Encoding Practices, Section 2.1
 */
export function resolveResponseMode(requested: ResponseMode | undefined, fragmentEncoded: boolean): ResponseMode {
  switch (requested) {
    case undefined:
      return fragmentEncoded ? 'fragment' : 'query';
    case 'form_post':
      return requested;
    case 'fragment':
      if (!fragmentEncoded) {
        throw OAuthError.invalidRequest('wrong response_mode');
      }
      return requested;
    case 'query':
      if (fragmentEncoded) {
        throw OAuthError.invalidRequest('wrong response_mode');
      }
      return requested;
    default:
      throw OAuthError.invalidRequest('Unknown response_mode');
  }
}

/**
 * Auto-submitting form that posts the response to the client
 * OAuth 2.0 Form Post Response Mode
 */
export function buildFormPost(action: string, args: ResponseArgs): string {
  const inputs = Object.entries(args)
    .map(([name, value]) => `<input type="hidden" name="${escapeHtml(name)}" value="${escapeHtml(value)}"/>`)
    .join('\n        ');

  return `<html>
  <head>
    <title>Submit This Form</title>
  </head>
  <body onload="javascript:document.forms[0].submit()">
    <form method="post" action="${escapeHtml(action)}">
        ${inputs}
    </form>
  </body>
</html>`;
}

/**
 * Redirect URI carrying the response in its query or fragment. Query
 * parameters the client registered on the URI are kept.
 */
export function buildRedirect(uri: string, args: ResponseArgs, placement: 'query' | 'fragment'): string {
  const url = new URL(uri);
  if (placement === 'query') {
    for (const [name, value] of Object.entries(args)) {
      url.searchParams.append(name, value);
    }
    return url.toString();
  }

  url.hash = new URLSearchParams(args).toString();
  return url.toString();
}

export function buildAuthorizationResponse(uri: string, args: ResponseArgs, mode: ResponseMode): AuthorizationResponse {
  if (mode === 'form_post') {
    return { kind: 'form_post', contentType: CONTENT_TYPE_HTML, body: buildFormPost(uri, args) };
  }
  return { kind: 'redirect', location: buildRedirect(uri, args, mode) };
}
