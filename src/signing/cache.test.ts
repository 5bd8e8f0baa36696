/**
 * Tests for signing key cache
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SigningKeyCache } from './cache.js';

describe('SigningKeyCache', () => {
  let cache: SigningKeyCache;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-10-19T00:00:00Z'));
    cache = new SigningKeyCache(1000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should store and retrieve keys', () => {
    const key = Buffer.from('key-1');
    cache.set('id-1', '20261019', 'us-east-1', 'email', key);

    expect(cache.get('id-1', '20261019', 'us-east-1', 'email')).toBe(key);
  });

  it('should return undefined for unknown keys', () => {
    expect(cache.get('id-1', '20261019', 'us-east-1', 'email')).toBeUndefined();
  });

  it('should keep keys apart by date, region and service', () => {
    cache.set('id-1', '20261019', 'us-east-1', 'email', Buffer.from('a'));
    cache.set('id-1', '20261020', 'us-east-1', 'email', Buffer.from('b'));
    cache.set('id-1', '20261019', 'eu-west-1', 'email', Buffer.from('c'));
    cache.set('id-1', '20261019', 'us-east-1', 'ses', Buffer.from('d'));

    expect(cache.size).toBe(4);
    expect(cache.get('id-1', '20261020', 'us-east-1', 'email')?.toString()).toBe('b');
    expect(cache.get('id-1', '20261019', 'eu-west-1', 'email')?.toString()).toBe('c');
    expect(cache.get('id-1', '20261019', 'us-east-1', 'ses')?.toString()).toBe('d');
  });

  it('should keep keys apart by credential identity', () => {
    cache.set('id-1', '20261019', 'us-east-1', 'email', Buffer.from('a'));
    cache.set('id-2', '20261019', 'us-east-1', 'email', Buffer.from('b'));

    expect(cache.size).toBe(2);
    expect(cache.get('id-1', '20261019', 'us-east-1', 'email')?.toString()).toBe('a');
    expect(cache.get('id-2', '20261019', 'us-east-1', 'email')?.toString()).toBe('b');
    expect(cache.get('id-3', '20261019', 'us-east-1', 'email')).toBeUndefined();
  });

  it('should expire entries after the ttl', () => {
    cache.set('id-1', '20261019', 'us-east-1', 'email', Buffer.from('a'));

    vi.setSystemTime(new Date('2026-10-19T00:00:00.999Z'));
    expect(cache.get('id-1', '20261019', 'us-east-1', 'email')).toBeDefined();

    vi.setSystemTime(new Date('2026-10-19T00:00:01Z'));
    expect(cache.get('id-1', '20261019', 'us-east-1', 'email')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should remove only expired entries on cleanup', () => {
    cache.set('id-1', '20261019', 'us-east-1', 'email', Buffer.from('old'));
    vi.setSystemTime(new Date('2026-10-19T00:00:00.500Z'));
    cache.set('id-1', '20261019', 'eu-west-1', 'email', Buffer.from('new'));

    vi.setSystemTime(new Date('2026-10-19T00:00:01Z'));
    expect(cache.cleanup()).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.get('id-1', '20261019', 'eu-west-1', 'email')?.toString()).toBe('new');
  });

  it('should clear all entries', () => {
    cache.set('id-1', '20261019', 'us-east-1', 'email', Buffer.from('a'));
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
