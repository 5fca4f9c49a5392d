import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import * as crypto from 'node:crypto';
import {
  FileScreenshotStore,
  MemoryScreenshotStore,
  isScreenshotRef,
  screenshotEntryFor,
} from '../../src/utils/artifacts.js';

describe('screenshotEntryFor', () => {
  it('derives the ref from the first 16 hex chars of the sha256', () => {
    const image = Buffer.from('fake-png-bytes');
    const sha = crypto.createHash('sha256').update(image).digest('hex');
    expect(screenshotEntryFor(image)).toEqual({ ref: `shot-${sha.slice(0, 16)}`, sha256: sha, bytes: 14 });
  });
});

describe('isScreenshotRef', () => {
  it('accepts well-formed refs only', () => {
    expect(isScreenshotRef('shot-0123456789abcdef')).toBe(true);
    expect(isScreenshotRef('shot-0123456789ABCDEF')).toBe(false);
    expect(isScreenshotRef('shot-0123')).toBe(false);
    expect(isScreenshotRef('../shot-0123456789abcdef')).toBe(false);
  });
});

describe('FileScreenshotStore', () => {
  let tmpDir: string;
  let store: FileScreenshotStore;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dp-shots-'));
    store = new FileScreenshotStore(path.join(tmpDir, 'artifacts'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes the image under <ref>.png and loads it back', async () => {
    const image = Buffer.from([1, 2, 3, 4]);
    const entry = await store.save(image);
    expect(fs.existsSync(path.join(tmpDir, 'artifacts', `${entry.ref}.png`))).toBe(true);
    expect(await store.load(entry.ref)).toEqual(image);
  });

  it('stores identical images once', async () => {
    const a = await store.save(Buffer.from('same'));
    const b = await store.save(Buffer.from('same'));
    expect(a.ref).toBe(b.ref);
    expect(fs.readdirSync(path.join(tmpDir, 'artifacts'))).toEqual([`${a.ref}.png`]);
  });

  it('returns null for unknown or malformed refs', async () => {
    expect(await store.load('shot-0000000000000000')).toBeNull();
    expect(await store.load('../../etc/passwd')).toBeNull();
  });

  it('resolves only valid refs to paths', () => {
    expect(store.resolve('shot-0000000000000000')).toBe(
      path.resolve(tmpDir, 'artifacts', 'shot-0000000000000000.png'),
    );
    expect(store.resolve('nope')).toBeNull();
  });
});

describe('MemoryScreenshotStore', () => {
  it('keeps images by ref', async () => {
    const store = new MemoryScreenshotStore();
    const entry = await store.save(Buffer.from('x'));
    expect(await store.load(entry.ref)).toEqual(Buffer.from('x'));
    expect(store.size).toBe(1);
  });
});
