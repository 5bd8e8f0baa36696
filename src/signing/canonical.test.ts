/**
 * Tests for canonical request building
 */

import { describe, it, expect } from 'vitest';
import {
  canonicalHeaders,
  canonicalQueryString,
  compareCodeUnits,
  normalizeUriPath,
  shouldSignHeader,
  uriEncode,
} from './canonical.js';
import { SigningError } from './error.js';

describe('uriEncode', () => {
  it('should encode spaces as %20', () => {
    expect(uriEncode('hello world')).toBe('hello%20world');
  });

  it('should encode reserved characters left alone by encodeURIComponent', () => {
    expect(uriEncode("a!b'c(d)e*")).toBe('a%21b%27c%28d%29e%2A');
  });

  it('should leave unreserved characters untouched', () => {
    expect(uriEncode('AZaz09-_.~')).toBe('AZaz09-_.~');
  });

  it('should encode slashes unless asked not to', () => {
    expect(uriEncode('path/to')).toBe('path%2Fto');
    expect(uriEncode('path/to/file', false)).toBe('path/to/file');
  });
});

describe('normalizeUriPath', () => {
  it('should return / for an empty path', () => {
    expect(normalizeUriPath('')).toBe('/');
    expect(normalizeUriPath('/')).toBe('/');
  });

  it('should collapse repeated slashes', () => {
    expect(normalizeUriPath('/path//to///resource')).toBe('/path/to/resource');
  });

  it('should resolve dot segments', () => {
    expect(normalizeUriPath('/path/./to/../resource')).toBe('/path/resource');
  });

  it('should keep a trailing slash', () => {
    expect(normalizeUriPath('/a/b/')).toBe('/a/b/');
  });

  it('should not double-encode segments', () => {
    expect(normalizeUriPath('/a%20b')).toBe('/a%20b');
  });
});

describe('canonicalQueryString', () => {
  it('should sort parameters by name', () => {
    expect(canonicalQueryString(new URLSearchParams('foo=bar&baz=qux'))).toBe('baz=qux&foo=bar');
  });

  it('should sort repeated names by value', () => {
    expect(canonicalQueryString(new URLSearchParams('a=2&a=1'))).toBe('a=1&a=2');
  });

  it('should encode spaces as %20', () => {
    expect(canonicalQueryString(new URLSearchParams('q=hello world'))).toBe('q=hello%20world');
  });

  it('should return an empty string without parameters', () => {
    expect(canonicalQueryString(new URLSearchParams())).toBe('');
  });
});

describe('compareCodeUnits', () => {
  it('should order upper case before lower case', () => {
    expect(['b', 'a', 'B'].sort(compareCodeUnits)).toEqual(['B', 'a', 'b']);
  });
});

describe('shouldSignHeader', () => {
  it('should sign host, content-type, date and x-amz-* headers', () => {
    expect(shouldSignHeader('Host')).toBe(true);
    expect(shouldSignHeader('content-type')).toBe(true);
    expect(shouldSignHeader('Date')).toBe(true);
    expect(shouldSignHeader('x-amz-date')).toBe(true);
  });

  it('should never sign authorization or user-agent', () => {
    expect(shouldSignHeader('authorization')).toBe(false);
    expect(shouldSignHeader('User-Agent')).toBe(false);
    expect(shouldSignHeader('x-amzn-authorization')).toBe(false);
  });

  it('should skip unknown headers', () => {
    expect(shouldSignHeader('accept')).toBe(false);
  });
});

describe('canonicalHeaders', () => {
  it('should lower-case, sort and trim signed headers', () => {
    const result = canonicalHeaders({
      Host: 'email.us-east-1.amazonaws.com',
      'X-Amz-Date': '20261019T080509Z',
      'User-Agent': 'test-agent',
      'Content-Type': '  application/x-www-form-urlencoded  ',
    });

    expect(result.canonical).toBe(
      'content-type:application/x-www-form-urlencoded\n' +
        'host:email.us-east-1.amazonaws.com\n' +
        'x-amz-date:20261019T080509Z\n'
    );
    expect(result.signed).toBe('content-type;host;x-amz-date');
  });

  it('should collapse inner whitespace', () => {
    const result = canonicalHeaders({ host: 'example.com', 'x-amz-meta': 'a   b\t c' });
    expect(result.canonical).toBe('host:example.com\nx-amz-meta:a b c\n');
  });

  it('should require a host header', () => {
    expect(() => canonicalHeaders({ date: 'Mon, 19 Oct 2026 08:05:09 +0000' })).toThrow(SigningError);

    try {
      canonicalHeaders({});
    } catch (error) {
      expect(error).toBeInstanceOf(SigningError);
      if (error instanceof SigningError) {
        expect(error.reason).toBe('MISSING_HEADER');
      }
    }
  });
});
