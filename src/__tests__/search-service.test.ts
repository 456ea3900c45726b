import path from 'node:path';
import { promises as fs } from 'node:fs';

import { MetadataResolver } from '../application/services/metadata-resolver';
import { SearchService } from '../application/services/search-service';
import { TreeWalker } from '../application/services/tree-walker';
import type { SearchCriteriaInput } from '../domain/search-criteria';
import { NodeFileSystem } from '../infrastructure/node-file-system';
import { makeTempDir, removeDir, setModified, writeFile } from './helpers/temp-tree';

const createService = () => {
  const fileSystem = new NodeFileSystem();
  return new SearchService(fileSystem, new TreeWalker(fileSystem), new MetadataResolver(fileSystem));
};

describe('SearchService', () => {
  let root: string;
  const service = createService();

  const searchNames = async (criteria: SearchCriteriaInput, now?: Date) => {
    const results = await service.search(root, criteria, { now });
    return results.map((item) => path.relative(root, item.path)).sort();
  };

  beforeEach(async () => {
    root = await makeTempDir();
    await writeFile(path.join(root, 'report.txt'), 'Quarterly Budget numbers');
    await writeFile(path.join(root, 'Report.md'), '# heading');
    await writeFile(path.join(root, 'notes', 'budget-plan.txt'), 'nothing here');
    await writeFile(path.join(root, 'image.PNG'), 'not really a png');
    await writeFile(path.join(root, 'data.json'), '{"budget": 1}');
    await fs.mkdir(path.join(root, 'reports.txt'));
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe('name mode', () => {
    it('matches substrings case-insensitively by default, directories included', async () => {
      await expect(searchNames({ keyword: 'report' })).resolves.toEqual(['Report.md', 'report.txt', 'reports.txt']);
    });

    it('respects case sensitivity', async () => {
      await expect(searchNames({ keyword: 'Report', caseSensitive: true })).resolves.toEqual(['Report.md']);
    });

    it('matches everything for an empty keyword', async () => {
      await expect(searchNames({})).resolves.toHaveLength(7);
    });
  });

  describe('extension mode', () => {
    it('adds the leading dot and compares the final extension', async () => {
      await expect(searchNames({ keyword: 'txt', searchMode: 'extension' })).resolves.toEqual([
        path.join('notes', 'budget-plan.txt'),
        'report.txt',
        'reports.txt',
      ]);
    });

    it('ignores case unless asked not to', async () => {
      await expect(searchNames({ keyword: '.png', searchMode: 'extension' })).resolves.toEqual(['image.PNG']);
      await expect(searchNames({ keyword: '.png', searchMode: 'extension', caseSensitive: true })).resolves.toEqual(
        [],
      );
    });
  });

  describe('content mode', () => {
    it('finds text files containing the keyword', async () => {
      await expect(searchNames({ keyword: 'budget', searchMode: 'content' })).resolves.toEqual([
        'data.json',
        'report.txt',
      ]);
    });

    it('respects case sensitivity in contents', async () => {
      await expect(searchNames({ keyword: 'Budget', searchMode: 'content', caseSensitive: true })).resolves.toEqual([
        'report.txt',
      ]);
    });

    it('skips files whose extension is not searchable as text', async () => {
      await expect(searchNames({ keyword: 'png', searchMode: 'content' })).resolves.toEqual([]);
    });

    it('finds a keyword split across read chunks', async () => {
      await writeFile(path.join(root, 'long.log'), `${'a'.repeat(64 * 1024 - 3)}needle${'b'.repeat(100)}`);

      await expect(searchNames({ keyword: 'needle', searchMode: 'content' })).resolves.toEqual(['long.log']);
    });
  });

  describe('size and age filters', () => {
    it('applies size bounds to files only', async () => {
      await expect(searchNames({ keyword: 'report', minSizeBytes: 10 })).resolves.toEqual([
        'report.txt',
        'reports.txt',
      ]);
      await expect(searchNames({ keyword: 'report', maxSizeBytes: 10 })).resolves.toEqual([
        'Report.md',
        'reports.txt',
      ]);
    });

    it('keeps files at least the given number of days old', async () => {
      const now = new Date('2024-06-01T00:00:00Z');
      await setModified(path.join(root, 'report.txt'), new Date('2024-01-01T00:00:00Z'));
      await setModified(path.join(root, 'Report.md'), new Date('2024-05-30T00:00:00Z'));

      await expect(searchNames({ keyword: 'report', minAgeDays: 30 }, now)).resolves.toEqual([
        'report.txt',
        'reports.txt',
      ]);
    });
  });

  it('rejects invalid criteria', async () => {
    await expect(service.search(root, { minSizeBytes: -1 })).rejects.toThrow();
  });
});
