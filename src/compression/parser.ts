/**
 * Parsers for user given format strings and file paths
 */

import * as path from 'path';
import {Extension} from './extension';
import {compressionFormatsFromText} from './table';
import {CompressionFormat} from './types';

export interface SeparatedPath {
  /**
   * Input path with every recognized trailing extension removed
   */
  residualPath: string;
  /**
   * Recognized extensions, left to right as written in the name
   */
  extensions: Extension[];
}

/**
 * Parse a user given format such as `"tar.gz"` or `".tar.gz"`.
 *
 * Empty pieces (leading, trailing or repeated dots) are ignored. If any piece
 * is not a known token nothing is returned. The result lists the pieces in
 * reverse: `"tar.gz"` => `[gz, tar]`.
 */
export function fromFormatText(format: string): Extension[] | undefined {
  const extensions: Extension[] = [];

  const pieces = format.split('.').filter(piece => piece.length > 0);
  for (const piece of pieces) {
    const formats = compressionFormatsFromText(piece);
    if (!formats) {
      return undefined;
    }
    extensions.push(new Extension(formats, piece));
  }

  extensions.reverse();
  return extensions;
}

/**
 * Strip known extensions off the end of a path, returning both the remaining
 * path and the extensions found.
 *
 * `"dir/bolovo.tar.gz"` => `{residualPath: "dir/bolovo", extensions: [tar, gz]}`
 */
export function separateKnownExtensionsFromName(
  filePath: string
): SeparatedPath {
  const extensions: Extension[] = [];
  let residualPath = filePath;

  // While there are known extensions at the tail, grab them
  for (;;) {
    const dotted = path.extname(residualPath);
    const token = dotted.slice(1);
    const formats = compressionFormatsFromText(token);
    if (!formats) {
      break;
    }
    extensions.push(new Extension(formats, token));

    // Only separators can follow the extension, so its last occurrence is it
    residualPath = residualPath.slice(0, residualPath.lastIndexOf(dotted));
  }

  // Found right to left, reported left to right
  extensions.reverse();

  return {residualPath, extensions};
}

/**
 * Known extensions at the end of a path, without the remaining path
 */
export function extensionsFromPath(filePath: string): Extension[] {
  const {extensions} = separateKnownExtensionsFromName(filePath);
  return extensions;
}

/**
 * Flatten extensions into the formats they stand for, in order
 */
export function formatsFromExtensions(
  extensions: readonly Extension[]
): CompressionFormat[] {
  return extensions.flatMap(extension => [...extension]);
}

/**
 * Dotted rendering of the matched text, e.g. `.tar.gz`
 */
export function describeExtensions(extensions: readonly Extension[]): string {
  return extensions.map(extension => `.${extension.displayText}`).join('');
}

/**
 * True when the base name itself is a bare token, like a file called `tar`.
 * Stripping `backup/tar.gz` leaves such a name behind.
 */
export function isExtensionLikeName(filePath: string): boolean {
  return compressionFormatsFromText(path.basename(filePath)) !== undefined;
}
