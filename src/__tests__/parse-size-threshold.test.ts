import { parseSize, parseSizeThreshold } from '../utils/parse-size-threshold';

describe('parseSize', () => {
  it('parses plain bytes and binary units', () => {
    expect(parseSize('1024')).toBe(1024);
    expect(parseSize('500KB')).toBe(500 * 1024);
    expect(parseSize('100mb')).toBe(100 * 1024 * 1024);
    expect(parseSize(' 1.5 GB ')).toBe(Math.floor(1.5 * 1024 ** 3));
    expect(parseSize('2TB')).toBe(2 * 1024 ** 4);
  });

  it('rejects values that are not sizes', () => {
    expect(parseSize('')).toBeUndefined();
    expect(parseSize('lots')).toBeUndefined();
    expect(parseSize('-5MB')).toBeUndefined();
    expect(parseSize('10 PB')).toBeUndefined();
  });
});

describe('parseSizeThreshold', () => {
  it('reads SKIP_ITEMS_SMALLER_THAN', () => {
    expect(parseSizeThreshold({ SKIP_ITEMS_SMALLER_THAN: '10MB' })).toBe(10 * 1024 * 1024);
  });

  it('returns undefined when unset or invalid', () => {
    expect(parseSizeThreshold({})).toBeUndefined();
    expect(parseSizeThreshold({ SKIP_ITEMS_SMALLER_THAN: 'big' })).toBeUndefined();
  });
});
