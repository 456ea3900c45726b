import path from 'node:path';
import { promises as fs } from 'node:fs';

import { JsonHistoryFile } from '../infrastructure/json-history-file';
import { NodeFileSystem } from '../infrastructure/node-file-system';
import { makeTempDir, removeDir, writeFile } from './helpers/temp-tree';

describe('JsonHistoryFile', () => {
  let root: string;
  let historyPath: string;
  let historyFile: JsonHistoryFile;

  beforeEach(async () => {
    root = await makeTempDir();
    historyPath = path.join(root, 'state', 'nested', 'history.json');
    historyFile = new JsonHistoryFile(new NodeFileSystem(), historyPath);
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('loads empty history when the document does not exist', async () => {
    await expect(historyFile.load()).resolves.toEqual({ recentPaths: [], frequencyCounts: {} });
  });

  it('saves into missing directories and loads the same document back', async () => {
    const history = { recentPaths: ['/b', '/a'], frequencyCounts: { '/a': 3, '/b': 1 } };

    await historyFile.save(history);

    await expect(historyFile.load()).resolves.toEqual(history);
    await expect(fs.readdir(path.dirname(historyPath))).resolves.toEqual(['history.json']);
  });

  it('writes indented JSON with both keys', async () => {
    await historyFile.save({ recentPaths: ['/a'], frequencyCounts: { '/a': 1 } });

    const raw = await fs.readFile(historyPath, 'utf8');
    expect(raw).toBe('{\n  "recentPaths": [\n    "/a"\n  ],\n  "frequencyCounts": {\n    "/a": 1\n  }\n}');
  });

  it('resets to empty history for invalid JSON', async () => {
    await writeFile(historyPath, '{ not json');

    await expect(historyFile.load()).resolves.toEqual({ recentPaths: [], frequencyCounts: {} });
  });

  it('resets to empty history for a document of the wrong shape', async () => {
    await writeFile(historyPath, JSON.stringify({ recentPaths: 'oops', frequencyCounts: { '/a': -1 } }));

    await expect(historyFile.load()).resolves.toEqual({ recentPaths: [], frequencyCounts: {} });
  });
});
