import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LocalResourceStore, computeEtag } from '../src/storage/index.js';
import { PNG_BYTES, makeTempDir } from './helpers.js';

let root = '';

beforeEach(async () => {
  root = await makeTempDir();
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe('LocalResourceStore', () => {
  it('resolves null when nothing is at the path', async () => {
    const store = new LocalResourceStore(path.join(root, 'chart.png'));
    await expect(store.read()).resolves.toBeNull();
  });

  it('resolves null when a parent segment is a file', async () => {
    const parent = path.join(root, 'not-a-dir');
    await fs.writeFile(parent, 'x');
    const store = new LocalResourceStore(path.join(parent, 'chart.png'));
    await expect(store.read()).resolves.toBeNull();
  });

  it('resolves null for a directory', async () => {
    const dir = path.join(root, 'chart.png');
    await fs.mkdir(dir);
    await expect(new LocalResourceStore(dir).read()).resolves.toBeNull();
  });

  it('reads bytes with size, mtime and etag', async () => {
    const file = path.join(root, 'chart.png');
    await fs.writeFile(file, PNG_BYTES);
    const stats = await fs.stat(file);

    const snapshot = await new LocalResourceStore(file).read();

    expect(snapshot).not.toBeNull();
    expect(snapshot?.bytes).toEqual(PNG_BYTES);
    expect(snapshot?.size).toBe(PNG_BYTES.length);
    expect(snapshot?.modifiedAt.getTime()).toBe(stats.mtime.getTime());
    expect(snapshot?.etag).toBe(computeEtag(stats.size, stats.mtimeMs));
  });

  it('reads an empty file as an empty resource', async () => {
    const file = path.join(root, 'chart.png');
    await fs.writeFile(file, Buffer.alloc(0));

    const snapshot = await new LocalResourceStore(file).read();

    expect(snapshot?.size).toBe(0);
    expect(snapshot?.bytes.length).toBe(0);
  });

  it('exposes its location', () => {
    const file = path.join(root, 'chart.png');
    const store = new LocalResourceStore(file);
    expect(store.location).toBe(file);
    expect(store.kind).toBe('local');
  });
});

describe('computeEtag', () => {
  it('encodes size and whole-millisecond mtime as hex', () => {
    expect(computeEtag(12, 1700000000123.75)).toBe('W/"c-18bcfe5687b"');
  });
});
