import { createHash } from 'node:crypto';
import path from 'node:path';
import { Readable } from 'node:stream';

import { FingerprintEngine } from '../application/services/fingerprint';
import { NodeFileSystem } from '../infrastructure/node-file-system';
import { makeTempDir, removeDir, writeFile } from './helpers/temp-tree';

class ExplodingStreamFileSystem extends NodeFileSystem {
  public override openReadStream(): Readable {
    return new Readable({
      read() {
        this.destroy(new Error('device error'));
      },
    });
  }
}

describe('FingerprintEngine', () => {
  let root: string;
  const engine = new FingerprintEngine(new NodeFileSystem());

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('matches the digest of the whole file for each algorithm', async () => {
    const contents = Buffer.from('hello duplicate world');
    const filePath = await writeFile(path.join(root, 'a.txt'), contents);

    for (const algorithm of ['md5', 'sha1', 'sha256'] as const) {
      const expected = createHash(algorithm).update(contents).digest('hex');
      await expect(engine.digest(filePath, { algorithm })).resolves.toBe(expected);
    }
  });

  it('defaults to md5', async () => {
    const filePath = await writeFile(path.join(root, 'a.txt'), 'abc');

    await expect(engine.digest(filePath)).resolves.toBe('900150983cd24fb0d6963f7d28e17f72');
  });

  it('gives the same result regardless of chunk size', async () => {
    const contents = Buffer.alloc(200_000, 7);
    contents.write('marker', 150_000);
    const filePath = await writeFile(path.join(root, 'big.bin'), contents);

    const small = await engine.digest(filePath, { algorithm: 'sha256', chunkSize: 1000 });
    const large = await engine.digest(filePath, { algorithm: 'sha256', chunkSize: 64 * 1024 });

    expect(small).toBe(large);
    expect(small).toBe(createHash('sha256').update(contents).digest('hex'));
  });

  it('differs when the bytes differ', async () => {
    const first = await writeFile(path.join(root, 'one.txt'), 'aaaa');
    const second = await writeFile(path.join(root, 'two.txt'), 'aaab');

    expect(await engine.digest(first)).not.toBe(await engine.digest(second));
  });

  it('returns null for missing files and directories', async () => {
    await expect(engine.digest(path.join(root, 'missing.bin'))).resolves.toBeNull();
    await expect(engine.digest(root)).resolves.toBeNull();
  });

  it('returns null for a chunk size that is not a positive integer', async () => {
    const filePath = await writeFile(path.join(root, 'a.txt'), 'hello world');

    await expect(engine.digest(filePath, { chunkSize: 0 })).resolves.toBeNull();
    await expect(engine.digest(filePath, { chunkSize: -1 })).resolves.toBeNull();
    await expect(engine.digest(filePath, { chunkSize: 1.5 })).resolves.toBeNull();
  });

  it('returns null when reading fails midway', async () => {
    const filePath = await writeFile(path.join(root, 'a.txt'), 'abc');
    const failing = new FingerprintEngine(new ExplodingStreamFileSystem());

    await expect(failing.digest(filePath)).resolves.toBeNull();
  });

  it('rethrows cancellation instead of returning null', async () => {
    const filePath = await writeFile(path.join(root, 'a.txt'), 'abc');
    const controller = new AbortController();
    controller.abort();

    await expect(engine.digest(filePath, { signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
  });
});
