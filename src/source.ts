import { closeSync, createReadStream, fstatSync, openSync, read } from 'node:fs';
import type { ReadStream } from 'node:fs';
import path from 'node:path';

import { IOError, messageOf } from './errors.js';

// Readers borrow the descriptor: destroying one must not close it under LocalFile.
const borrowedFs = {
  read,
  close: (_fd: number, callback: (error: NodeJS.ErrnoException | null) => void) => callback(null),
};

/**
 * A local file opened for reading. The descriptor belongs to whichever builder
 * holds the file and is released through {@link LocalFile.close}.
 */
export class LocalFile {
  private released = false;
  private readonly readers = new Set<ReadStream>();

  private constructor(
    public readonly path: string,
    public readonly fd: number,
    public readonly size: number,
  ) {}

  static open(filePath: string): LocalFile {
    let fd: number;
    try {
      fd = openSync(filePath, 'r');
    } catch (error) {
      throw new IOError(filePath, `cannot open ${filePath}: ${messageOf(error)}`, { cause: error });
    }

    try {
      const stat = fstatSync(fd);
      if (!stat.isFile()) {
        throw new IOError(filePath, `${filePath} is not a regular file`);
      }
      return new LocalFile(filePath, fd, stat.size);
    } catch (error) {
      closeSync(fd);
      if (error instanceof IOError) {
        throw error;
      }
      throw new IOError(filePath, `cannot stat ${filePath}: ${messageOf(error)}`, { cause: error });
    }
  }

  get name(): string {
    return path.basename(this.path);
  }

  get closed(): boolean {
    return this.released;
  }

  /** Reads from offset 0 without taking ownership of the descriptor. */
  stream(): ReadStream {
    const reader = createReadStream(this.path, { fd: this.fd, fs: borrowedFs, autoClose: false, start: 0 });
    this.readers.add(reader);
    reader.once('close', () => this.readers.delete(reader));
    return reader;
  }

  /** Stops any reader still open on the descriptor, then closes it. */
  close(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    for (const reader of this.readers) {
      reader.destroy();
    }
    this.readers.clear();
    closeSync(this.fd);
  }
}

export type Source = { kind: 'url'; url: string } | { kind: 'file'; file: LocalFile };

export function isRemoteUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function classifySource(value: string): Source {
  if (isRemoteUrl(value)) {
    return { kind: 'url', url: value };
  }
  return { kind: 'file', file: LocalFile.open(value) };
}
