import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as crypto from 'node:crypto';

export interface ScreenshotEntry {
  ref: string;
  sha256: string;
  bytes: number;
}

export interface ScreenshotStore {
  save(image: Buffer): Promise<ScreenshotEntry>;
  load(ref: string): Promise<Buffer | null>;
}

const REF_PATTERN = /^shot-[0-9a-f]{16}$/;

export function isScreenshotRef(ref: string): boolean {
  return REF_PATTERN.test(ref);
}

export function screenshotEntryFor(image: Buffer): ScreenshotEntry {
  const sha256 = crypto.createHash('sha256').update(image).digest('hex');
  return { ref: `shot-${sha256.slice(0, 16)}`, sha256, bytes: image.length };
}

export class FileScreenshotStore implements ScreenshotStore {
  constructor(private readonly dir: string) {}

  async save(image: Buffer): Promise<ScreenshotEntry> {
    const entry = screenshotEntryFor(image);
    const filePath = this.pathFor(entry.ref);

    await fs.mkdir(this.dir, { recursive: true });
    try {
      await fs.access(filePath);
      return entry;
    } catch (err) {
      if (!isErrnoException(err) || err.code !== 'ENOENT') throw err;
    }

    const tmpPath = `${filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, image);
    await fs.rename(tmpPath, filePath);
    return entry;
  }

  async load(ref: string): Promise<Buffer | null> {
    if (!isScreenshotRef(ref)) return null;
    try {
      return await fs.readFile(this.pathFor(ref));
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw err;
    }
  }

  // Absolute file path for a valid ref, or null
  resolve(ref: string): string | null {
    return isScreenshotRef(ref) ? path.resolve(this.pathFor(ref)) : null;
  }

  private pathFor(ref: string): string {
    return path.join(this.dir, `${ref}.png`);
  }
}

// In-memory store for tests and short-lived tooling
export class MemoryScreenshotStore implements ScreenshotStore {
  private readonly images = new Map<string, Buffer>();

  async save(image: Buffer): Promise<ScreenshotEntry> {
    const entry = screenshotEntryFor(image);
    this.images.set(entry.ref, image);
    return entry;
  }

  async load(ref: string): Promise<Buffer | null> {
    return this.images.get(ref) ?? null;
  }

  get size(): number {
    return this.images.size;
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
