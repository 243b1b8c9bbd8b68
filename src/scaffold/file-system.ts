import { existsSync, mkdirSync, writeFileSync } from 'fs';

/**
 * The filesystem operations the materializer needs. Synchronous: a run is a
 * single sequential pass over local disk.
 */
export interface FileSystem {
  exists(path: string): boolean;
  /** Non-recursive mode must fail with EEXIST when the directory is already there */
  mkdir(path: string, options: { recursive: boolean }): void;
  /** Must fail rather than overwrite an existing file */
  writeFile(path: string, content: string | Uint8Array): void;
}

export class NodeFileSystem implements FileSystem {
  exists(path: string): boolean {
    return existsSync(path);
  }

  mkdir(path: string, options: { recursive: boolean }): void {
    mkdirSync(path, { recursive: options.recursive });
  }

  writeFile(path: string, content: string | Uint8Array): void {
    // 'wx' = create exclusively, EEXIST if the file is already there
    if (typeof content === 'string') {
      writeFileSync(path, content, { encoding: 'utf-8', flag: 'wx' });
    } else {
      writeFileSync(path, content, { flag: 'wx' });
    }
  }
}

/**
 * `code` of a Node system error, if it has one.
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
