import { parseEmailDate } from '../../utils/email-date';

describe('parseEmailDate', () => {
  it('should parse RFC 2822 dates with numeric offsets', () => {
    expect(parseEmailDate('Mon, 15 Jan 2024 10:00:00 +0000')?.toISOString()).toBe('2024-01-15T10:00:00.000Z');
    expect(parseEmailDate('15 Jan 2024 10:00:00 +0530')?.toISOString()).toBe('2024-01-15T04:30:00.000Z');
    expect(parseEmailDate('Tue, 16 Jan 2024 08:30:00 -0500')?.toISOString()).toBe('2024-01-16T13:30:00.000Z');
  });

  it('should parse named zones', () => {
    expect(parseEmailDate('15 Jan 2024 10:00:00 EST')?.toISOString()).toBe('2024-01-15T15:00:00.000Z');
    expect(parseEmailDate('15 Jan 2024 10:00:00 GMT')?.toISOString()).toBe('2024-01-15T10:00:00.000Z');
  });

  it('should read missing and unknown zones as UTC', () => {
    expect(parseEmailDate('3 Mar 2024 00:00:00')?.toISOString()).toBe('2024-03-03T00:00:00.000Z');
    expect(parseEmailDate('3 Mar 2024 00:00:00 XYZ')?.toISOString()).toBe('2024-03-03T00:00:00.000Z');
  });

  it('should expand two-digit years', () => {
    expect(parseEmailDate('1 Feb 99 23:59 GMT')?.toISOString()).toBe('1999-02-01T23:59:00.000Z');
    expect(parseEmailDate('1 Feb 24 23:59 GMT')?.toISOString()).toBe('2024-02-01T23:59:00.000Z');
  });

  it('should ignore a trailing zone comment', () => {
    expect(parseEmailDate('Mon, 15 Jan 2024 10:00:00 +0000 (UTC)')?.toISOString()).toBe('2024-01-15T10:00:00.000Z');
  });

  it('should accept ISO 8601 timestamps', () => {
    expect(parseEmailDate('2024-03-05T08:00:00Z')?.toISOString()).toBe('2024-03-05T08:00:00.000Z');
  });

  it('should reject impossible or unparsable dates', () => {
    expect(parseEmailDate('Fri, 31 Feb 2024 10:00:00 +0000')).toBeUndefined();
    expect(parseEmailDate('15 Foo 2024 10:00:00 +0000')).toBeUndefined();
    expect(parseEmailDate('15 Jan 2024 25:00:00 +0000')).toBeUndefined();
    expect(parseEmailDate('sometime last week')).toBeUndefined();
    expect(parseEmailDate('')).toBeUndefined();
    expect(parseEmailDate(undefined)).toBeUndefined();
  });
});
