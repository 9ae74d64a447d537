/**
 * Extension token table
 */

import {CompressionFormat} from './types';

const {GZIP, BZIP, LZ4, LZMA, SNAPPY, ZSTD, TAR, ZIP} = CompressionFormat;

type FormatSequence = readonly CompressionFormat[];

function sequence(...formats: CompressionFormat[]): FormatSequence {
  return Object.freeze(formats);
}

// Compound tokens (tgz, txz, ...) are tar aliases wrapped in a compressor
const TAR_ONLY = sequence(TAR);
const TAR_GZIP = sequence(TAR, GZIP);
const TAR_BZIP = sequence(TAR, BZIP);
const TAR_LZ4 = sequence(TAR, LZ4);
const TAR_LZMA = sequence(TAR, LZMA);
const TAR_SNAPPY = sequence(TAR, SNAPPY);
const TAR_ZSTD = sequence(TAR, ZSTD);
const ZIP_ONLY = sequence(ZIP);
const BZIP_ONLY = sequence(BZIP);
const GZIP_ONLY = sequence(GZIP);
const LZ4_ONLY = sequence(LZ4);
const LZMA_ONLY = sequence(LZMA);
const SNAPPY_ONLY = sequence(SNAPPY);
const ZSTD_ONLY = sequence(ZSTD);

const extensionTable: ReadonlyMap<string, FormatSequence> = new Map([
  ['tar', TAR_ONLY],
  ['tgz', TAR_GZIP],
  ['tbz', TAR_BZIP],
  ['tbz2', TAR_BZIP],
  ['tlz4', TAR_LZ4],
  ['txz', TAR_LZMA],
  ['tlzma', TAR_LZMA],
  ['tsz', TAR_SNAPPY],
  ['tzst', TAR_ZSTD],
  ['zip', ZIP_ONLY],
  ['bz', BZIP_ONLY],
  ['bz2', BZIP_ONLY],
  ['gz', GZIP_ONLY],
  ['lz4', LZ4_ONLY],
  ['xz', LZMA_ONLY],
  ['lzma', LZMA_ONLY],
  ['sz', SNAPPY_ONLY],
  ['zst', ZSTD_ONLY],
]);

/**
 * Every token the table accepts, in table order
 */
export const SUPPORTED_EXTENSIONS: readonly string[] = Object.freeze([
  ...extensionTable.keys(),
]);

/**
 * Look up the formats an extension token stands for.
 *
 * - `"tar"` => `[TAR]`
 * - `"tgz"` => `[TAR, GZIP]`
 *
 * The token must not contain dots; anything not in the table (including
 * dotted or differently cased text) returns undefined.
 */
export function compressionFormatsFromText(
  extension: string
): FormatSequence | undefined {
  return extensionTable.get(extension);
}
