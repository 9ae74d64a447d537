/**
 * Compression format identifiers
 */

export enum CompressionFormat {
  GZIP = 'gzip',
  BZIP = 'bzip',
  LZ4 = 'lz4',
  LZMA = 'lzma',
  SNAPPY = 'snappy',
  ZSTD = 'zstd',
  TAR = 'tar',
  ZIP = 'zip',
}

function unreachable(format: never): never {
  throw new Error(`Unhandled compression format: ${String(format)}`);
}

/**
 * Archive containers bundle several files into one stream (tar, zip);
 * everything else compresses a single stream
 */
export function isArchiveFormat(format: CompressionFormat): boolean {
  // No default arm: a new format must be classified here
  switch (format) {
    case CompressionFormat.TAR:
    case CompressionFormat.ZIP:
      return true;
    case CompressionFormat.GZIP:
    case CompressionFormat.BZIP:
    case CompressionFormat.LZ4:
    case CompressionFormat.LZMA:
    case CompressionFormat.SNAPPY:
    case CompressionFormat.ZSTD:
      return false;
    default:
      return unreachable(format);
  }
}

/**
 * Canonical dotted rendering, e.g. `.gz`
 */
export function formatDisplayText(format: CompressionFormat): string {
  switch (format) {
    case CompressionFormat.GZIP:
      return '.gz';
    case CompressionFormat.BZIP:
      return '.bz';
    case CompressionFormat.ZSTD:
      return '.zst';
    case CompressionFormat.LZ4:
      return '.lz4';
    case CompressionFormat.LZMA:
      return '.lz';
    case CompressionFormat.SNAPPY:
      return '.sz';
    case CompressionFormat.TAR:
      return '.tar';
    case CompressionFormat.ZIP:
      return '.zip';
    default:
      return unreachable(format);
  }
}
