/**
 * Tests for signing timestamp formats
 */

import { describe, it, expect } from 'vitest';
import { formatDate, formatDateTime, formatHttpDate } from './time.js';

describe('time formats', () => {
  const date = new Date('2026-10-19T08:05:09Z');

  it('should format the scope date', () => {
    expect(formatDate(date)).toBe('20261019');
  });

  it('should format the amz datetime', () => {
    expect(formatDateTime(date)).toBe('20261019T080509Z');
  });

  it('should format the date header with a numeric zone', () => {
    expect(formatHttpDate(date)).toBe('Mon, 19 Oct 2026 08:05:09 +0000');
  });

  it('should zero-pad single digit days', () => {
    expect(formatHttpDate(new Date('2026-03-05T23:59:01Z'))).toBe('Thu, 05 Mar 2026 23:59:01 +0000');
  });

  it('should always use UTC', () => {
    expect(formatDateTime(new Date('2026-10-19T23:30:00-02:00'))).toBe('20261020T013000Z');
  });
});
