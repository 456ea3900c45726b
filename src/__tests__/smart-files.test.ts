import path from 'node:path';
import { promises as fs } from 'node:fs';

import { createSmartFiles } from '../application/smart-files';
import type { SmartFiles } from '../application/smart-files';
import { collect, makeTempDir, removeDir, writeFile } from './helpers/temp-tree';

describe('SmartFiles', () => {
  let root: string;
  let workspace: string;
  let smartFiles: SmartFiles;

  beforeEach(async () => {
    root = await makeTempDir();
    workspace = path.join(root, 'workspace');
    await fs.mkdir(workspace);
    smartFiles = createSmartFiles({
      historyPath: path.join(root, 'state', 'history.json'),
      duplicateDefaults: { minSizeBytes: 0, concurrency: 2 },
    });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('finds duplicates using the configured defaults', async () => {
    const shared = 'same bytes'.repeat(50);
    const a = await writeFile(path.join(workspace, 'a.txt'), shared);
    const b = await writeFile(path.join(workspace, 'b.txt'), shared);
    await writeFile(path.join(workspace, 'c.txt'), 'diff bytes'.repeat(50));

    const duplicates = await smartFiles.findDuplicates(workspace);

    expect(duplicates.size).toBe(1);
    expect([...duplicates.values()].map((members) => [...members].sort())).toEqual([[a, b].sort()]);
  });

  it('lets a call override the duplicate defaults', async () => {
    await writeFile(path.join(workspace, 'a.txt'), 'tiny');
    await writeFile(path.join(workspace, 'b.txt'), 'tiny');

    const report = await smartFiles.duplicateReport(workspace, { minSizeBytes: 1024 });

    expect(report.groups).toEqual([]);
    expect(report.root).toBe(workspace);
  });

  it('walks the same tree the scanners see', async () => {
    await writeFile(path.join(workspace, 'dir', 'x.txt'), 'x');

    await expect(collect(smartFiles.walk(workspace))).resolves.toEqual([
      path.join(workspace, 'dir'),
      path.join(workspace, 'dir', 'x.txt'),
    ]);
  });

  it('suggests children, matching files and siblings ranked by access count', async () => {
    const projects = path.join(workspace, 'projects');
    const alpha = path.join(projects, 'alpha');
    const sub = path.join(alpha, 'sub');
    const beta = path.join(projects, 'beta');
    const gamma = path.join(projects, 'gamma');
    await fs.mkdir(sub, { recursive: true });
    await fs.mkdir(beta);
    await fs.mkdir(gamma);
    const w = await writeFile(path.join(alpha, 'w.py'), 'w');
    const x = await writeFile(path.join(alpha, 'x.py'), 'x');
    const y = await writeFile(path.join(alpha, 'y.py'), 'y');
    const z = await writeFile(path.join(alpha, 'z.txt'), 'z');

    for (const visited of [alpha, alpha, alpha, sub, sub, beta, gamma, gamma, x, z, y]) {
      await smartFiles.recordAccess(visited);
    }

    const suggestions = await smartFiles.contextualSuggestions(alpha);

    expect(suggestions.map((item) => item.path)).toEqual([sub, gamma, x, y, beta, w]);
    await expect(smartFiles.contextualSuggestions(alpha, 3).then((items) => items.map((item) => item.path)))
      .resolves.toEqual([sub, gamma, x]);
  });

  it('records history that survives a new instance', async () => {
    const file = await writeFile(path.join(workspace, 'notes.md'), 'n');
    await smartFiles.recordAccess(file);
    await smartFiles.recordAccess(file);

    const reopened = createSmartFiles({ historyPath: path.join(root, 'state', 'history.json') });

    await expect(reopened.recentItems().then((items) => items.map((item) => item.path))).resolves.toEqual([file]);
    await expect(reopened.frequentItems(5).then((items) => items.map((item) => item.name))).resolves.toEqual([
      'notes.md',
    ]);
  });
});
