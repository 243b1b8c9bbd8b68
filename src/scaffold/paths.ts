import { UnsafePathError } from '../core/errors.js';
import type { DirectorySet, FileManifest } from '../core/types.js';

/**
 * Accept only relative POSIX paths that stay inside the project root:
 * no leading slash, no drive letter, no backslash, no empty, `.` or `..` segment.
 */
export function assertSafeRelativePath(path: string): void {
  if (
    path.length === 0 ||
    path.startsWith('/') ||
    path.includes('\\') ||
    /^[A-Za-z]:/.test(path) ||
    path.split('/').some(segment => segment === '' || segment === '.' || segment === '..')
  ) {
    throw new UnsafePathError(path);
  }
}

/**
 * Every ancestor directory of every manifest key plus `extra`; a parent is
 * always inserted before its children.
 */
export function deriveDirectories(manifests: FileManifest[], extra: Iterable<string> = []): DirectorySet {
  const dirs: DirectorySet = new Set();

  const addWithAncestors = (dir: string): void => {
    const segments = dir.split('/');
    for (let i = 1; i <= segments.length; i++) {
      dirs.add(segments.slice(0, i).join('/'));
    }
  };

  for (const manifest of manifests) {
    for (const path of manifest.keys()) {
      const slash = path.lastIndexOf('/');
      if (slash > 0) addWithAncestors(path.slice(0, slash));
    }
  }
  for (const dir of extra) {
    addWithAncestors(dir);
  }

  return dirs;
}
