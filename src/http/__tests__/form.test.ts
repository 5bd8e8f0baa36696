/**
 * Tests for form encoding
 */

import { describe, it, expect } from 'vitest';
import { FormParams, formEncode } from '../form.js';

describe('formEncode', () => {
  it('should escape @ in addresses', () => {
    expect(formEncode('a@x.com')).toBe('a%40x.com');
  });

  it('should write spaces as + and escape !', () => {
    expect(formEncode('Hello world!')).toBe('Hello+world%21');
  });

  it('should escape a literal +', () => {
    expect(formEncode('a+b')).toBe('a%2Bb');
  });

  it('should leave unreserved characters alone', () => {
    expect(formEncode('AZaz09-_.~')).toBe('AZaz09-_.~');
  });

  it('should percent-encode UTF-8 bytes', () => {
    expect(formEncode('é')).toBe('%C3%A9');
  });

  it('should escape base64 padding and separators', () => {
    expect(formEncode('ab+/=')).toBe('ab%2B%2F%3D');
  });
});

describe('FormParams', () => {
  it('should encode fields sorted by name', () => {
    const params = new FormParams().set('b', '2').set('a', '1').set('B', '3');
    expect(params.encode()).toBe('B=3&a=1&b=2');
  });

  it('should keep insertion order for iteration', () => {
    const params = new FormParams().set('b', '2').set('a', '1');
    expect(params.keys()).toEqual(['b', 'a']);
    expect([...params]).toEqual([
      ['b', '2'],
      ['a', '1'],
    ]);
  });

  it('should replace a value set twice', () => {
    const params = new FormParams().set('a', '1').set('a', '2');
    expect(params.size).toBe(1);
    expect(params.get('a')).toBe('2');
  });

  it('should report missing fields', () => {
    const params = new FormParams();
    expect(params.has('a')).toBe(false);
    expect(params.get('a')).toBeUndefined();
    expect(params.encode()).toBe('');
  });

  it('should serialize to a plain object', () => {
    const params = new FormParams().set('Action', 'SendEmail');
    expect(params.toJSON()).toEqual({ Action: 'SendEmail' });
  });
});
