/**
 * In-memory FileSystem for Testing
 */

import { dirname } from 'node:path';
import type { FileSystem } from '../../src/scaffold/file-system.js';

export class FakeFsError extends Error {
  constructor(public readonly code: string, syscall: string, path: string) {
    super(`${code}: ${describe(code)}, ${syscall} '${path}'`);
    this.name = 'FakeFsError';
  }
}

function describe(code: string): string {
  switch (code) {
    case 'EEXIST': return 'file already exists';
    case 'ENOENT': return 'no such file or directory';
    case 'EACCES': return 'permission denied';
    default: return 'unknown error';
  }
}

export class MemoryFileSystem implements FileSystem {
  readonly dirs = new Set<string>(['/']);
  readonly files = new Map<string, string | Uint8Array>();
  /** Every mutating call in order, e.g. "mkdir /a" or "write /a/b.txt" */
  readonly calls: string[] = [];
  /** Absolute paths whose write fails with EACCES */
  readonly failWrites = new Set<string>();
  /** Absolute paths whose mkdir fails with EACCES */
  readonly failMkdirs = new Set<string>();

  constructor(existingDirs: string[] = []) {
    for (const dir of existingDirs) {
      this.addDir(dir);
    }
  }

  exists(path: string): boolean {
    return this.dirs.has(path) || this.files.has(path);
  }

  mkdir(path: string, options: { recursive: boolean }): void {
    this.calls.push(`mkdir ${path}`);
    if (this.failMkdirs.has(path)) throw new FakeFsError('EACCES', 'mkdir', path);
    if (this.files.has(path)) throw new FakeFsError('EEXIST', 'mkdir', path);
    if (this.dirs.has(path)) {
      if (options.recursive) return;
      throw new FakeFsError('EEXIST', 'mkdir', path);
    }
    if (!this.dirs.has(dirname(path))) {
      if (!options.recursive) throw new FakeFsError('ENOENT', 'mkdir', path);
      this.mkdir(dirname(path), options);
    }
    this.dirs.add(path);
  }

  writeFile(path: string, content: string | Uint8Array): void {
    this.calls.push(`write ${path}`);
    if (this.failWrites.has(path)) throw new FakeFsError('EACCES', 'open', path);
    if (!this.dirs.has(dirname(path))) throw new FakeFsError('ENOENT', 'open', path);
    if (this.exists(path)) throw new FakeFsError('EEXIST', 'open', path);
    this.files.set(path, content);
  }

  private addDir(path: string): void {
    let current = path;
    while (!this.dirs.has(current)) {
      this.dirs.add(current);
      current = dirname(current);
    }
  }
}
