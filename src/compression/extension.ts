/**
 * A matched extension token and the formats it stands for
 */

import * as assert from 'assert';
import {CompressionFormat, isArchiveFormat} from './types';

export class Extension implements Iterable<CompressionFormat> {
  /**
   * One token like "tgz" can stand for several formats ([TAR, GZIP])
   */
  readonly compressionFormats: readonly CompressionFormat[];

  /**
   * The text that was matched, like "tgz", "tar" or "xz"
   */
  readonly displayText: string;

  /**
   * @throws AssertionError if `formats` is empty; only a malformed table can cause it
   */
  constructor(formats: readonly CompressionFormat[], displayText: string) {
    assert.ok(
      formats.length > 0,
      `Extension "${displayText}" must have at least one compression format`
    );

    this.compressionFormats = Object.isFrozen(formats)
      ? formats
      : Object.freeze([...formats]);
    this.displayText = displayText;
  }

  /**
   * Archive-ness follows the outermost layer, the first format
   */
  isArchive(): boolean {
    return isArchiveFormat(this.compressionFormats[0]);
  }

  /**
   * Display text is not part of an extension's identity
   */
  equals(other: Extension): boolean {
    return (
      this.compressionFormats.length === other.compressionFormats.length &&
      this.compressionFormats.every(
        (format, i) => format === other.compressionFormats[i]
      )
    );
  }

  /**
   * Identity as a string, for Map and Set keys
   */
  key(): string {
    return this.compressionFormats.join('+');
  }

  [Symbol.iterator](): Iterator<CompressionFormat> {
    return this.compressionFormats[Symbol.iterator]();
  }

  toString(): string {
    return this.displayText;
  }
}
