/**
 * Tests for user time layouts and database value parsing.
 */

import { types } from 'pg';
import { describe, expect, it } from 'vitest';
import {
  extractDateLayout,
  formatInZone,
  formatParts,
  formatWallClock,
  InMemoryLogger,
  parseWallClock,
  registerTypeParsers,
  resolveTimeZone,
  stripTrailingSemicolons,
  TypeOid,
  zonedParts,
} from '../index.js';

describe('formatParts', () => {
  const parts = { year: 2024, month: 3, day: 5, hour: 7, minute: 8, second: 9, millisecond: 45 };

  it('should render every token', () => {
    expect(formatParts(parts, 'yy/MM/dd HH:mm:ss.SSS')).toBe('24/03/05 07:08:09.045');
    expect(formatParts(parts, 'SS|S')).toBe('04|0');
    expect(formatParts(parts, 'yyyyMMdd')).toBe('20240305');
  });

  it('should copy other characters literally', () => {
    expect(formatParts(parts, 'dd.MM.yyyy at HH')).toBe('05.03.2024 at 07');
  });
});

describe('extractDateLayout', () => {
  it('should cut after the last date token', () => {
    expect(extractDateLayout('yyyy-MM-dd HH:mm:ss')).toBe('yyyy-MM-dd');
    expect(extractDateLayout('dd/MM/yyyy HH:mm')).toBe('dd/MM/yyyy');
  });

  it('should keep layouts without date tokens', () => {
    expect(extractDateLayout('HH:mm')).toBe('HH:mm');
  });
});

describe('zones', () => {
  const instant = new Date(Date.UTC(2024, 6, 1, 12, 30, 0));

  it('should read fields in an IANA zone', () => {
    expect(zonedParts(instant, 'America/New_York')).toMatchObject({ year: 2024, month: 7, day: 1, hour: 8, minute: 30 });
    expect(formatInZone(instant, 'yyyy-MM-dd HH:mm', 'UTC')).toBe('2024-07-01 12:30');
  });

  it('should format wall clocks with UTC getters', () => {
    expect(formatWallClock(instant, 'HH:mm:ss')).toBe('12:30:00');
  });

  it('should resolve zone names', () => {
    const logger = new InMemoryLogger();

    expect(resolveTimeZone('', logger)).toBeUndefined();
    expect(resolveTimeZone('Europe/Paris', logger)).toBe('Europe/Paris');
    expect(resolveTimeZone('Nowhere/Land', logger)).toBeUndefined();
    expect(logger.getEntries().map(e => e.context)).toEqual([{ timeZone: 'Nowhere/Land' }]);
  });
});

describe('database value parsing', () => {
  it('should parse DATE and TIMESTAMP text as wall-clock dates', () => {
    const date = parseWallClock('2024-01-15');
    const timestamp = parseWallClock('2024-01-15 13:45:30.123456');

    expect(date instanceof Date && date.getTime()).toBe(Date.UTC(2024, 0, 15));
    expect(timestamp instanceof Date && timestamp.getTime()).toBe(Date.UTC(2024, 0, 15, 13, 45, 30, 123));
  });

  it('should keep special values as text', () => {
    expect(parseWallClock('infinity')).toBe('infinity');
    expect(parseWallClock('-infinity')).toBe('-infinity');
  });

  it('should install the type parsers', () => {
    registerTypeParsers();

    expect(types.getTypeParser(TypeOid.Interval)('1 day')).toBe('1 day');
    expect(types.getTypeParser(TypeOid.Date)('2024-01-15')).toBeInstanceOf(Date);
  });

  it('should strip trailing semicolons', () => {
    expect(stripTrailingSemicolons(' SELECT 1;; ')).toBe('SELECT 1');
    expect(stripTrailingSemicolons("SELECT ';' AS s")).toBe("SELECT ';' AS s");
  });
});
