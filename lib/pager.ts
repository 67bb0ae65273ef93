import fs from 'fs';

import { PAGE_SIZE, TABLE_MAX_PAGES } from './constant';
import { IOFailureError, OutOfRangeError } from './errors';

/**
 * File layout, a flat sequence of pages, no header:
 *
 * 0          4096       8192                 n * 4096
 * +----------+----------+-------- ... -------+-----------+
 * |  page 0  |  page 1  |                    | page n    |
 * +----------+----------+-------- ... -------+-----------+
 *
 * the last page may be shorter on disk when it was flushed partially.
 */
export class Pager {
  static getPageOffsetById(pageNum: number) {
    return pageNum * PAGE_SIZE;
  }

  static open(filePath: string): Pager {
    let fd: number;
    let fileLength: number;
    try {
      fd = fs.openSync(filePath, fs.existsSync(filePath) ? 'r+' : 'w+');
    } catch (err) {
      throw new IOFailureError('open', err);
    }
    try {
      fileLength = fs.fstatSync(fd).size;
    } catch (err) {
      fs.closeSync(fd);
      throw new IOFailureError('open', err);
    }
    return new Pager(fd, fileLength);
  }

  public readonly fd: number;
  public readonly fileLength: number;
  private readonly pages: (Buffer | null)[];
  private closed = false;

  constructor(fd: number, fileLength: number) {
    this.fd = fd;
    this.fileLength = fileLength;
    this.pages = new Array<Buffer | null>(TABLE_MAX_PAGES).fill(null);
  }

  /**
   * pages present in the file when it was opened, a short last page counts
   */
  public get numPages(): number {
    return Math.ceil(this.fileLength / PAGE_SIZE);
  }

  public isResident(pageNum: number): boolean {
    return this.pages[pageNum] != null;
  }

  /**
   * returns the resident page, loading it from disk on first access.
   * pages beyond the end of the file come back zero-filled.
   */
  public getPage(pageNum: number): Buffer {
    if (
      !Number.isInteger(pageNum) ||
      pageNum < 0 ||
      pageNum >= TABLE_MAX_PAGES
    ) {
      throw new OutOfRangeError(
        `Tried to fetch page number out of bounds. ` +
          `${pageNum} >= ${TABLE_MAX_PAGES}`
      );
    }
    if (this.closed) {
      throw new IOFailureError('fetch', new Error('pager is closed'));
    }

    const cached = this.pages[pageNum];
    if (cached) {
      return cached;
    }

    const buf = Buffer.alloc(PAGE_SIZE);
    if (pageNum < this.numPages) {
      this.readPageById(pageNum, buf);
    }
    this.pages[pageNum] = buf;
    return buf;
  }

  /**
   * writes the first `size` bytes of a resident page back to its place in
   * the file, does nothing when the page was never loaded.
   */
  public flush(pageNum: number, size: number = PAGE_SIZE) {
    const buf = this.pages[pageNum];
    if (!buf) {
      return;
    }
    if (size < 0 || size > PAGE_SIZE) {
      throw new OutOfRangeError(`Flush size ${size} is outside of a page`);
    }
    try {
      const position = Pager.getPageOffsetById(pageNum);
      fs.writeSync(this.fd, buf, 0, size, position);
    } catch (err) {
      throw new IOFailureError('write', err);
    }
  }

  public release(pageNum: number) {
    if (pageNum >= 0 && pageNum < TABLE_MAX_PAGES) {
      this.pages[pageNum] = null;
    }
  }

  public close() {
    if (this.closed) {
      return;
    }
    try {
      fs.closeSync(this.fd);
    } catch (err) {
      throw new IOFailureError('close', err);
    }
    this.closed = true;
    this.pages.fill(null);
  }

  private readPageById(pageNum: number, buf: Buffer) {
    try {
      // a short read leaves the tail of `buf` zero-filled
      const position = Pager.getPageOffsetById(pageNum);
      fs.readSync(this.fd, buf, 0, PAGE_SIZE, position);
    } catch (err) {
      throw new IOFailureError('read', err);
    }
  }
}
