import { describe, it, expect } from 'vitest';

import { fileStamp, formatUtc, formatZoned } from '../services/timestamps.js';

describe('timestamps', () => {
  const date = new Date('2024-03-05T07:08:09.500Z');

  it('should format file stamps in UTC with dashes and an underscore', () => {
    expect(fileStamp(date)).toBe('2024-03-05_07-08-09');
  });

  it('should format the UTC tooltip text', () => {
    expect(formatUtc(date)).toBe('2024-03-05 07:08:09 UTC');
  });

  it('should format in UTC when asked for the UTC zone', () => {
    expect(formatZoned(date, 'UTC')).toBe('2024-03-05 07:08:09 UTC');
  });

  it('should shift the wall time into the requested zone', () => {
    // Tokyo is UTC+9 with no daylight saving
    expect(formatZoned(date, 'Asia/Tokyo')).toMatch(/^2024-03-05 16:08:09 /);
  });

  it('should use 00 rather than 24 for midnight', () => {
    expect(formatZoned(new Date('2024-01-01T00:00:00Z'), 'UTC')).toBe('2024-01-01 00:00:00 UTC');
  });
});
