import path from 'node:path';
import { promises as fs } from 'node:fs';

import { TreeWalker } from '../application/services/tree-walker';
import { NodeFileSystem } from '../infrastructure/node-file-system';
import { collect, makeTempDir, removeDir, writeFile } from './helpers/temp-tree';

class UnreadableDirectoryFileSystem extends NodeFileSystem {
  public constructor(private readonly blocked: string) {
    super();
  }

  public override async canRead(targetPath: string): Promise<boolean> {
    if (targetPath === this.blocked) {
      return false;
    }
    return super.canRead(targetPath);
  }
}

describe('TreeWalker', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
    await writeFile(path.join(root, 'top.txt'), 'top');
    await writeFile(path.join(root, 'docs', 'a.md'), 'a');
    await writeFile(path.join(root, 'docs', 'deep', 'b.md'), 'b');
    await fs.mkdir(path.join(root, 'empty'));
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('yields every file and directory below the root, but not the root', async () => {
    const walker = new TreeWalker(new NodeFileSystem());

    const paths = await collect(walker.walk(root));

    expect([...paths].sort()).toEqual(
      [
        path.join(root, 'docs'),
        path.join(root, 'docs', 'a.md'),
        path.join(root, 'docs', 'deep'),
        path.join(root, 'docs', 'deep', 'b.md'),
        path.join(root, 'empty'),
        path.join(root, 'top.txt'),
      ].sort(),
    );
  });

  it('yields a directory before anything inside it', async () => {
    const walker = new TreeWalker(new NodeFileSystem());

    const paths = await collect(walker.walk(root));

    expect(paths.indexOf(path.join(root, 'docs'))).toBeLessThan(paths.indexOf(path.join(root, 'docs', 'a.md')));
    expect(paths.indexOf(path.join(root, 'docs', 'deep'))).toBeLessThan(
      paths.indexOf(path.join(root, 'docs', 'deep', 'b.md')),
    );
  });

  it('silently skips directories that fail the read check', async () => {
    const walker = new TreeWalker(new UnreadableDirectoryFileSystem(path.join(root, 'docs')));

    const paths = await collect(walker.walk(root));

    expect(paths).toContain(path.join(root, 'docs'));
    expect(paths).not.toContain(path.join(root, 'docs', 'a.md'));
    expect(paths).not.toContain(path.join(root, 'docs', 'deep'));
    expect(paths).toContain(path.join(root, 'top.txt'));
  });

  it('yields nothing for a missing root', async () => {
    const walker = new TreeWalker(new NodeFileSystem());

    await expect(collect(walker.walk(path.join(root, 'nope')))).resolves.toEqual([]);
  });

  it('reports symlinked directories without following them', async () => {
    const loop = path.join(root, 'docs', 'loop');
    await fs.symlink(root, loop, 'dir');
    const walker = new TreeWalker(new NodeFileSystem());

    const paths = await collect(walker.walk(root));

    expect(paths.filter((entry) => entry === loop)).toHaveLength(1);
    expect(paths.some((entry) => entry.startsWith(`${loop}${path.sep}`))).toBe(false);
  });

  it('starts a fresh traversal on every call and can be stopped early', async () => {
    const walker = new TreeWalker(new NodeFileSystem());

    const first: string[] = [];
    for await (const entry of walker.walk(root)) {
      first.push(entry);
      break;
    }
    const full = await collect(walker.walk(root));

    expect(first).toHaveLength(1);
    expect(full).toHaveLength(6);
  });

  it('stops with an AbortError once the signal is aborted', async () => {
    const walker = new TreeWalker(new NodeFileSystem());
    const controller = new AbortController();
    controller.abort();

    await expect(collect(walker.walk(root, { signal: controller.signal }))).rejects.toMatchObject({
      name: 'AbortError',
    });
  });

  it('reports each directory it lists to the progress reporter', async () => {
    const walker = new TreeWalker(new NodeFileSystem());
    const visited: string[] = [];
    const progress = {
      updateCurrent: (label: string) => visited.push(label),
      addProcessed: () => undefined,
    };

    await collect(walker.walk(root, { progress }));

    expect([...visited].sort()).toEqual(
      [root, path.join(root, 'docs'), path.join(root, 'docs', 'deep'), path.join(root, 'empty')].sort(),
    );
  });
});
