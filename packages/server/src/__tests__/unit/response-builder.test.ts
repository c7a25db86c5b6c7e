import { describe, it, expect } from 'vitest';
import {
  buildAuthorizationResponse,
  buildFormPost,
  buildRedirect,
  resolveResponseMode,
} from '../../authorization/response-builder.js';
import { OAuthError } from '../../errors/oauth-error.js';

describe('resolveResponseMode', () => {
  it('should default to the encoding the response type demands', () => {
    expect(resolveResponseMode(undefined, false)).toBe('query');
    expect(resolveResponseMode(undefined, true)).toBe('fragment');
  });

  it('should allow form_post for any response type', () => {
    expect(resolveResponseMode('form_post', false)).toBe('form_post');
    expect(resolveResponseMode('form_post', true)).toBe('form_post');
  });

  it('should refuse query for fragment encoded responses', () => {
    expect(() => resolveResponseMode('query', true)).toThrow(OAuthError);
    expect(() => resolveResponseMode('query', true)).toThrow('wrong response_mode');
  });

  it('should refuse fragment for query encoded responses', () => {
    expect(() => resolveResponseMode('fragment', false)).toThrow('wrong response_mode');
  });
});

describe('buildRedirect', () => {
  it('should append to a registered query', () => {
    expect(buildRedirect('https://rp.example.com/cb?tenant=a', { code: 'abc', state: 'x y' }, 'query')).toBe(
      'https://rp.example.com/cb?tenant=a&code=abc&state=x+y'
    );
  });

  it('should put the arguments in the fragment', () => {
    expect(buildRedirect('https://rp.example.com/cb', { access_token: 't', token_type: 'Bearer' }, 'fragment')).toBe(
      'https://rp.example.com/cb#access_token=t&token_type=Bearer'
    );
  });
});

describe('buildFormPost', () => {
  it('should escape names and values', () => {
    const html = buildFormPost('https://rp.example.com/cb?a=1&b=2', { state: '"><script>' });

    expect(html).toContain('<form method="post" action="https://rp.example.com/cb?a=1&amp;b=2">');
    expect(html).toContain('<input type="hidden" name="state" value="&quot;&gt;&lt;script&gt;"/>');
  });
});

describe('buildAuthorizationResponse', () => {
  it('should produce a form for form_post', () => {
    const response = buildAuthorizationResponse('https://rp.example.com/cb', { code: 'abc' }, 'form_post');

    expect(response.kind).toBe('form_post');
    if (response.kind === 'form_post') {
      expect(response.body).toContain('<input type="hidden" name="code" value="abc"/>');
    }
  });

  it('should produce a redirect otherwise', () => {
    expect(buildAuthorizationResponse('https://rp.example.com/cb', { code: 'abc' }, 'query')).toEqual({
      kind: 'redirect',
      location: 'https://rp.example.com/cb?code=abc',
    });
  });
});
