import { encodeQuery, queryEscape } from '../../src/utils/query';
import { formatRfc3339Nano, parseRfc3339 } from '../../src/utils/time';

describe('queryEscape', () => {
  it('should escape everything but unreserved characters', () => {
    expect(queryEscape("a b*~(c)!'")).toBe('a+b%2A~%28c%29%21%27');
    expect(queryEscape('http://foo.ospry.io/x.png')).toBe('http%3A%2F%2Ffoo.ospry.io%2Fx.png');
  });
});

describe('encodeQuery', () => {
  it('should sort keys and skip undefined values', () => {
    expect(encodeQuery({ url: 'x', maxHeight: undefined, format: 'gif', signature: 'a+b=' })).toBe(
      'format=gif&signature=a%2Bb%3D&url=x'
    );
  });

  it('should encode an empty set as an empty string', () => {
    expect(encodeQuery({})).toBe('');
  });
});

describe('formatRfc3339Nano', () => {
  it('should trim trailing zeros of the fraction', () => {
    expect(formatRfc3339Nano(new Date('2030-01-02T03:04:05.500Z'))).toBe('2030-01-02T03:04:05.5Z');
    expect(formatRfc3339Nano(new Date('2030-01-02T03:04:05.678Z'))).toBe('2030-01-02T03:04:05.678Z');
  });

  it('should drop a zero fraction', () => {
    expect(formatRfc3339Nano(new Date('2030-01-02T03:04:05.000Z'))).toBe('2030-01-02T03:04:05Z');
  });
});

describe('parseRfc3339', () => {
  it('should parse UTC timestamps', () => {
    expect(parseRfc3339('2030-01-02T03:04:05Z')).toEqual(new Date('2030-01-02T03:04:05.000Z'));
  });

  it('should truncate fractions finer than a millisecond', () => {
    expect(parseRfc3339('2030-01-02T03:04:05.123456789Z')).toEqual(new Date('2030-01-02T03:04:05.123Z'));
  });

  it('should apply numeric offsets', () => {
    expect(parseRfc3339('2030-01-02T05:04:05+02:00')).toEqual(new Date('2030-01-02T03:04:05.000Z'));
    expect(parseRfc3339('2030-01-01T22:34:05-04:30')).toEqual(new Date('2030-01-02T03:04:05.000Z'));
  });

  it('should keep years below 100 literal', () => {
    expect(parseRfc3339('0001-01-01T00:00:00Z')?.toISOString()).toBe('0001-01-01T00:00:00.000Z');
    expect(parseRfc3339('0099-12-31T23:59:59.5Z')?.toISOString()).toBe('0099-12-31T23:59:59.500Z');
  });

  it('should reject malformed timestamps', () => {
    expect(parseRfc3339('2030-01-02')).toBeNull();
    expect(parseRfc3339('2030-02-30T00:00:00Z')).toBeNull();
    expect(parseRfc3339('2030-01-02T24:00:00Z')).toBeNull();
    expect(parseRfc3339('yesterday')).toBeNull();
  });
});
