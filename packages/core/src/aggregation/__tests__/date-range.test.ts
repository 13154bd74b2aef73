import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../store/store-errors.js';
import { dayRange, withinRange } from '../date-range.js';

describe('dayRange', () => {
  it('should expand dates to whole-day bounds', () => {
    expect(dayRange('2026-01-10', '2026-01-12')).toEqual({
      startTs: '2026-01-10 00:00:00',
      endTs: '2026-01-12 23:59:59',
    });
  });

  it('should leave blank or missing ends open', () => {
    expect(dayRange()).toEqual({});
    expect(dayRange('  ', '2026-01-12')).toEqual({ endTs: '2026-01-12 23:59:59' });
    expect(dayRange(' 2026-01-10 ')).toEqual({ startTs: '2026-01-10 00:00:00' });
  });

  it('should reject malformed dates', () => {
    expect(() => dayRange('2026/01/10')).toThrow(ValidationError);
    expect(() => dayRange('2026/01/10')).toThrow('Dates must use the YYYY-MM-DD format: 2026/01/10');
  });

  it('should reject dates that do not exist', () => {
    expect(() => dayRange(undefined, '2026-02-30')).toThrow('Not a calendar date: 2026-02-30');
  });
});

describe('withinRange', () => {
  const range = { startTs: '2026-01-10 00:00:00', endTs: '2026-01-12 23:59:59' };

  it('should include both bounds', () => {
    expect(withinRange('2026-01-10 00:00:00', range)).toBe(true);
    expect(withinRange('2026-01-12 23:59:59', range)).toBe(true);
  });

  it('should exclude timestamps outside', () => {
    expect(withinRange('2026-01-09 23:59:59', range)).toBe(false);
    expect(withinRange('2026-01-13 00:00:00', range)).toBe(false);
  });

  it('should treat a missing bound as open', () => {
    expect(withinRange('1999-01-01 00:00:00', { endTs: range.endTs })).toBe(true);
  });
});
