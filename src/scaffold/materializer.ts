/**
 * Writes a FileManifest under a freshly created project root.
 *
 * The root must not exist beforehand. Directory creation failures abort the
 * run; individual file failures are recorded and the pass continues. The run
 * only counts as failed when an essential file is among the failures.
 */

import { join } from 'path';
import { getLogger, type Logger } from '../core/logger.js';
import {
  DestinationExistsError,
  DirectoryCreateError,
  RootCreateError,
  toError,
} from '../core/errors.js';
import type { DirectorySet, FileFailure, FileManifest, MaterializeResult } from '../core/types.js';
import { NodeFileSystem, errorCode, type FileSystem } from './file-system.js';
import { assertSafeRelativePath } from './paths.js';

export interface MaterializeExtras {
  /** Best-effort artifacts written after the main manifest */
  auxiliary?: FileManifest;
  /** Paths whose failure marks the whole run unsuccessful */
  essentials?: ReadonlySet<string>;
}

export class TreeMaterializer {
  constructor(
    private readonly fs: FileSystem = new NodeFileSystem(),
    private readonly logger: Logger = getLogger(),
  ) {}

  materialize(
    rootDir: string,
    manifest: FileManifest,
    directories: DirectorySet,
    extras: MaterializeExtras = {},
  ): MaterializeResult {
    const auxiliary: FileManifest = extras.auxiliary ?? new Map();
    const essentials = extras.essentials ?? new Set<string>();

    for (const path of [...manifest.keys(), ...auxiliary.keys(), ...directories]) {
      assertSafeRelativePath(path);
    }

    if (this.fs.exists(rootDir)) {
      throw new DestinationExistsError(rootDir);
    }

    try {
      this.fs.mkdir(rootDir, { recursive: false });
    } catch (err) {
      // Lost a race with another process creating the same directory
      if (errorCode(err) === 'EEXIST') throw new DestinationExistsError(rootDir);
      throw new RootCreateError(rootDir, toError(err));
    }
    this.logger.debug({ rootDir }, 'Created project root');

    for (const dir of directories) {
      const target = this.resolve(rootDir, dir);
      try {
        this.fs.mkdir(target, { recursive: true });
      } catch (err) {
        throw new DirectoryCreateError(target, toError(err));
      }
      this.logger.debug({ dir }, 'Created directory');
    }

    const createdPaths: string[] = [];
    const failures: FileFailure[] = [];

    const writeAll = (entries: FileManifest): void => {
      for (const [path, content] of entries) {
        try {
          this.fs.writeFile(this.resolve(rootDir, path), content);
          createdPaths.push(path);
          this.logger.debug({ path }, 'Wrote file');
        } catch (err) {
          const reason = toError(err).message;
          failures.push({ path, reason });
          this.logger.warn({ path, reason }, 'Failed to write file');
        }
      }
    };

    writeAll(manifest);
    writeAll(auxiliary);

    const success = !failures.some(f => essentials.has(f.path));
    return {
      rootDir,
      requested: manifest.size + auxiliary.size,
      created: createdPaths.length,
      createdPaths,
      failures,
      success,
    };
  }

  private resolve(rootDir: string, relativePath: string): string {
    return join(rootDir, ...relativePath.split('/'));
  }
}
