/**
 * Compression module - Extension recognition
 *
 * This module provides:
 * - The closed set of supported compression and archive formats
 * - The token table mapping extensions (gz, tgz, ...) to formats
 * - Parsers for format strings and file path suffixes
 */

export * from './types';
export * from './table';
export * from './extension';
export * from './parser';
