import { describe, it, expect } from 'vitest';
import { validateApkPath, createInstallGuard } from '../../src/security/pathGuard.js';
import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs';

describe('validateApkPath', () => {
  const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'apkguard-'));
  const apkRoot = path.join(tmpRoot, 'apks');
  const outsideDir = path.join(tmpRoot, 'outside');

  fs.mkdirSync(path.join(apkRoot, 'debug'), { recursive: true });
  fs.mkdirSync(path.join(apkRoot, 'folder.apk'), { recursive: true });
  fs.mkdirSync(outsideDir, { recursive: true });
  fs.writeFileSync(path.join(apkRoot, 'shop.apk'), 'apk');
  fs.writeFileSync(path.join(apkRoot, 'debug', 'internal.apk'), 'apk');
  fs.writeFileSync(path.join(apkRoot, 'notes.txt'), 'text');
  fs.writeFileSync(path.join(outsideDir, 'other.apk'), 'apk');
  fs.symlinkSync(path.join(outsideDir, 'other.apk'), path.join(apkRoot, 'link.apk'));

  const denyGlobs = ['debug/**'];

  it('allows an APK under an allowed root', () => {
    const result = validateApkPath(path.join(apkRoot, 'shop.apk'), [apkRoot], denyGlobs);
    expect(result.allowed).toBe(true);
    expect(result.resolved).toBe(fs.realpathSync(path.join(apkRoot, 'shop.apk')));
  });

  it('rejects files that are not APKs', () => {
    const result = validateApkPath(path.join(apkRoot, 'notes.txt'), [apkRoot], denyGlobs);
    expect(result).toEqual({ allowed: false, reason: 'Path must point to an .apk file' });
  });

  it('rejects missing files', () => {
    const result = validateApkPath(path.join(apkRoot, 'missing.apk'), [apkRoot], denyGlobs);
    expect(result.reason).toBe('APK file not found');
  });

  it('rejects directories', () => {
    const result = validateApkPath(path.join(apkRoot, 'folder.apk'), [apkRoot], denyGlobs);
    expect(result.reason).toBe('APK path is not a regular file');
  });

  it('rejects APKs outside all roots', () => {
    const result = validateApkPath(path.join(outsideDir, 'other.apk'), [apkRoot], denyGlobs);
    expect(result.allowed).toBe(false);
    expect(result.reason).toBe('Path not under any allowed APK root');
  });

  it('rejects symlinks that escape the root', () => {
    const result = validateApkPath(path.join(apkRoot, 'link.apk'), [apkRoot], denyGlobs);
    expect(result.reason).toBe('Path not under any allowed APK root');
  });

  it('rejects ../ traversal resolving outside the root', () => {
    const result = validateApkPath(path.join(apkRoot, '..', 'outside', 'other.apk'), [apkRoot], denyGlobs);
    expect(result.allowed).toBe(false);
  });

  it('rejects paths matching a deny glob', () => {
    const result = validateApkPath(path.join(apkRoot, 'debug', 'internal.apk'), [apkRoot], denyGlobs);
    expect(result.reason).toBe('Path matches deny glob: debug/**');
  });

  it('accepts any existing APK when no roots are configured', () => {
    expect(validateApkPath(path.join(outsideDir, 'other.apk'), [], []).allowed).toBe(true);
  });

  it('rejects empty and null-byte paths', () => {
    expect(validateApkPath('', [apkRoot], denyGlobs).allowed).toBe(false);
    expect(validateApkPath('/tmp/foo\0bar.apk', [apkRoot], denyGlobs).allowed).toBe(false);
  });
});

describe('createInstallGuard', () => {
  it('returns null for allowed paths and the reason otherwise', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'apkguard-fn-'));
    fs.writeFileSync(path.join(dir, 'ok.apk'), 'apk');
    const guard = createInstallGuard([dir], []);
    expect(guard(path.join(dir, 'ok.apk'))).toBeNull();
    expect(guard(path.join(dir, 'nope.apk'))).toBe('APK file not found');
  });
});
