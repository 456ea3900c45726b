import { parseArgs } from '../utils/parse-args';

describe('parseArgs', () => {
  it('splits the command, positionals and options', () => {
    const parsed = parseArgs([
      'search',
      '/data',
      '-k',
      'todo',
      '--mode',
      'content',
      '--case-sensitive',
      '--min-size',
      '10MB',
      '--limit',
      '5',
      '-o',
      'out.json',
    ]);

    expect(parsed).toEqual({
      command: 'search',
      positional: ['/data'],
      outputPath: 'out.json',
      keyword: 'todo',
      mode: 'content',
      caseSensitive: true,
      minSizeBytes: 10 * 1024 * 1024,
      maxSizeBytes: undefined,
      minAgeDays: undefined,
      limit: 5,
      algorithm: undefined,
    });
  });

  it('rejects a trailing short option without a value', () => {
    expect(() => parseArgs(['search', '/data', '-k'])).toThrow('Missing value for -k');
    expect(() => parseArgs(['duplicates', '/data', '-o'])).toThrow('Missing value for -o');
  });

  it('rejects a trailing long option without a value', () => {
    expect(() => parseArgs(['large', '/data', '--limit'])).toThrow('Missing value for --limit');
  });

  it('rejects malformed option values', () => {
    expect(() => parseArgs(['large', '/data', '--min-size', 'lots'])).toThrow(
      '--min-size expects a size such as 10MB, got "lots"',
    );
    expect(() => parseArgs(['old', '/data', '--min-age', '-3'])).toThrow(
      '--min-age expects a non-negative number, got "-3"',
    );
  });
});
