/**
 * CharSource - character streams the tokenizer reads from
 */

import { closeSync, openSync, readSync } from 'node:fs';
import { StringDecoder } from 'node:string_decoder';
import { LoaderError } from './LoaderError';

const BOM = '\uFEFF';

export interface CharSource {
  /** next character, or null once the input is exhausted (and on every call after) */
  read(): string | null;
}

/**
 * In-memory text. A leading byte order mark is skipped.
 */
export class StringSource implements CharSource {
  private position: number;

  constructor(private readonly text: string) {
    this.position = text.startsWith(BOM) ? 1 : 0;
  }

  read(): string | null {
    if (this.position >= this.text.length) {
      return null;
    }
    return this.text[this.position++];
  }
}

/**
 * A file read in fixed-size chunks with blocking reads, decoded as UTF-8 with a
 * leading byte order mark dropped.
 * The source owns its descriptor; call close() when done.
 */
export class FileSource implements CharSource {
  private readonly fd: number;
  private readonly chunk: Buffer;
  private readonly decoder = new StringDecoder('utf8');
  private pending = '';
  private position = 0;
  private exhausted = false;
  // no text decoded yet, so a BOM may still come
  private atStart = true;
  private closed = false;

  private constructor(
    private readonly path: string,
    fd: number,
    chunkSize: number
  ) {
    this.fd = fd;
    this.chunk = Buffer.alloc(chunkSize);
  }

  /**
   * Opens `path` for reading
   * @throws LoaderError `io` when the file cannot be opened
   */
  static open(path: string, chunkSize: number): FileSource {
    let fd: number;
    try {
      fd = openSync(path, 'r');
    } catch (error) {
      throw new LoaderError('io', `cannot open ${path}`, { cause: error });
    }
    return new FileSource(path, fd, chunkSize);
  }

  read(): string | null {
    while (this.position >= this.pending.length) {
      if (this.exhausted) {
        return null;
      }
      this.fill();
    }
    return this.pending[this.position++];
  }

  close(): void {
    if (!this.closed) {
      this.closed = true;
      closeSync(this.fd);
    }
  }

  private fill(): void {
    let bytesRead: number;
    try {
      bytesRead = readSync(this.fd, this.chunk, 0, this.chunk.length, null);
    } catch (error) {
      throw new LoaderError('io', `cannot read ${this.path}`, { cause: error });
    }

    this.position = 0;
    if (bytesRead === 0) {
      this.exhausted = true;
      this.pending = this.decoder.end();
    } else {
      this.pending = this.decoder.write(this.chunk.subarray(0, bytesRead));
    }

    if (this.atStart && this.pending !== '') {
      this.atStart = false;
      if (this.pending.startsWith(BOM)) {
        this.pending = this.pending.slice(1);
      }
    }
  }
}
