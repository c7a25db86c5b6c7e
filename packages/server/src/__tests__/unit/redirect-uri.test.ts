import { describe, it, expect } from 'vitest';
import { getUri, verifyUri } from '../../authorization/redirect-uri.js';
import { RedirectUriError } from '../../errors/session-errors.js';
import { testClient } from './fixtures.js';

describe('verifyUri', () => {
  it('should accept a registered URI', () => {
    const client = testClient();

    expect(() => verifyUri(client, 'https://rp.example.com/cb')).not.toThrow();
  });

  it('should reject another path or host', () => {
    const client = testClient();

    expect(() => verifyUri(client, 'https://rp.example.com/other')).toThrow(
      'redirect_uri does not match any registered URI'
    );
    expect(() => verifyUri(client, 'https://evil.example.com/cb')).toThrow(RedirectUriError);
  });

  it('should reject a fragment', () => {
    const client = testClient();

    expect(() => verifyUri(client, 'https://rp.example.com/cb#frag')).toThrow('Redirect URI contains a fragment');
  });

  it('should reject a relative URI', () => {
    expect(() => verifyUri(testClient(), '/cb')).toThrow('Not an absolute URI: /cb');
  });

  it('should require exactly the registered query', () => {
    const client = testClient({ redirectUris: ['https://rp.example.com/cb?tenant=a'] });

    expect(() => verifyUri(client, 'https://rp.example.com/cb?tenant=a')).not.toThrow();
    expect(() => verifyUri(client, 'https://rp.example.com/cb')).toThrow(
      'redirect_uri is missing registered query parameters'
    );
    expect(() => verifyUri(client, 'https://rp.example.com/cb?tenant=b')).toThrow(
      'redirect_uri is missing registered query parameters'
    );
    expect(() => verifyUri(client, 'https://rp.example.com/cb?tenant=a&extra=1')).toThrow(
      'redirect_uri has unregistered query parameters'
    );
  });

  it('should check post logout URIs against their own registrations', () => {
    const client = testClient({ postLogoutRedirectUris: ['https://rp.example.com/bye'] });

    expect(() => verifyUri(client, 'https://rp.example.com/bye', 'post_logout_redirect_uri')).not.toThrow();
    expect(() => verifyUri(client, 'https://rp.example.com/cb', 'post_logout_redirect_uri')).toThrow(
      'post_logout_redirect_uri does not match any registered URI'
    );
  });

  it('should reject when nothing is registered', () => {
    expect(() => verifyUri(testClient(), 'https://rp.example.com/bye', 'post_logout_redirect_uri')).toThrow(
      'No registered post_logout_redirect_uri'
    );
  });
});

describe('getUri', () => {
  it('should return a requested URI once verified', () => {
    expect(getUri(testClient(), 'https://rp.example.com/cb')).toBe('https://rp.example.com/cb');
  });

  it('should fall back to the only registered URI', () => {
    expect(getUri(testClient(), undefined)).toBe('https://rp.example.com/cb');
  });

  it('should refuse to guess between several registered URIs', () => {
    const client = testClient({ redirectUris: ['https://rp.example.com/a', 'https://rp.example.com/b'] });

    expect(() => getUri(client, undefined)).toThrow('Missing redirect_uri and more than one registered');
  });
});
