import * as path from 'node:path';
import * as fs from 'node:fs';
import { minimatch } from 'minimatch';

export interface PathGuardResult {
  allowed: boolean;
  resolved?: string;
  reason?: string;
}

function resolveRoot(root: string): string {
  try {
    return fs.realpathSync(path.resolve(root));
  } catch {
    return path.resolve(root);
  }
}

function isUnderRoot(resolved: string, resolvedRoot: string): boolean {
  if (resolved === resolvedRoot) return true;
  const prefix = resolvedRoot.endsWith(path.sep) ? resolvedRoot : resolvedRoot + path.sep;
  return resolved.startsWith(prefix);
}

/**
 * Check an APK path on the host before it is handed to `adb install`.
 * Symlinks are resolved; the real file must sit under one of `apkRoots` and
 * match none of `denyGlobs` (relative to that root). No roots means any
 * existing .apk is accepted.
 */
export function validateApkPath(
  targetPath: string,
  apkRoots: string[],
  denyGlobs: string[],
): PathGuardResult {
  if (!targetPath || targetPath.includes('\0')) {
    return { allowed: false, reason: 'Invalid path: empty or contains null byte' };
  }
  if (path.extname(targetPath).toLowerCase() !== '.apk') {
    return { allowed: false, reason: 'Path must point to an .apk file' };
  }

  let resolved: string;
  try {
    resolved = fs.realpathSync(path.resolve(targetPath));
  } catch {
    return { allowed: false, reason: 'APK file not found' };
  }
  if (!fs.statSync(resolved).isFile()) {
    return { allowed: false, resolved, reason: 'APK path is not a regular file' };
  }

  if (apkRoots.length === 0) {
    return { allowed: true, resolved };
  }

  const matchingRoots = apkRoots.map(resolveRoot).filter(root => isUnderRoot(resolved, root));
  if (matchingRoots.length === 0) {
    return { allowed: false, resolved, reason: 'Path not under any allowed APK root' };
  }

  for (const root of matchingRoots) {
    const relative = path.relative(root, resolved).split(path.sep).join('/');
    for (const glob of denyGlobs) {
      if (minimatch(relative, glob, { dot: true })) {
        return { allowed: false, resolved, reason: `Path matches deny glob: ${glob}` };
      }
    }
  }

  return { allowed: true, resolved };
}

export function createInstallGuard(apkRoots: string[], denyGlobs: string[]) {
  return (apkPath: string): string | null => {
    const result = validateApkPath(apkPath, apkRoots, denyGlobs);
    return result.allowed ? null : (result.reason ?? 'denied');
  };
}
