/**
 * Turn action inputs into extension reports
 */

import * as core from '@actions/core';
import {
  CompressionFormat,
  Extension,
  SUPPORTED_EXTENSIONS,
  describeExtensions,
  formatsFromExtensions,
  fromFormatText,
  isExtensionLikeName,
  separateKnownExtensionsFromName,
} from './compression';

export interface FormatReport {
  format: string;
  /**
   * Display text of each piece, in parser order
   */
  extensions: string[];
  formats: CompressionFormat[];
  isArchive: boolean;
}

export interface PathReport {
  path: string;
  residualPath: string;
  extensions: string[];
  formats: CompressionFormat[];
  isArchive: boolean;
}

export function supportedExtensionsHint(): string {
  return `Supported extensions: ${SUPPORTED_EXTENSIONS.join(', ')}`;
}

function toDisplayTexts(extensions: Extension[]): string[] {
  return extensions.map(extension => extension.displayText);
}

/**
 * Parse the `format` input
 * Throws when any piece is unknown or there are no pieces at all
 */
export function resolveFormat(format: string): FormatReport {
  core.debug(`Parsing format: ${format}`);

  const extensions = fromFormatText(format);
  if (!extensions) {
    throw new Error(`Unsupported format '${format}'. ${supportedExtensionsHint()}`);
  }
  if (extensions.length === 0) {
    throw new Error(`Format '${format}' does not name any extension`);
  }

  const report: FormatReport = {
    format,
    extensions: toDisplayTexts(extensions),
    formats: formatsFromExtensions(extensions),
    isArchive: extensions[0].isArchive(),
  };

  core.info(`📦 Format '${format}': ${report.formats.join(' + ')}`);
  core.debug(`  Archive: ${report.isArchive ? 'Yes' : 'No'}`);

  return report;
}

/**
 * Split known extensions off every path
 * With `failOnUnknown`, a path without any known extension is an error
 */
export function resolvePaths(
  paths: string[],
  failOnUnknown: boolean
): PathReport[] {
  core.info(`📂 Inspecting ${paths.length} path(s):`);

  const reports: PathReport[] = [];
  const unknown: string[] = [];

  for (const filePath of paths) {
    const {residualPath, extensions} = separateKnownExtensionsFromName(filePath);

    if (extensions.length === 0) {
      core.info(`   - ${filePath}: ❌ no known extension`);
      unknown.push(filePath);
    } else {
      core.info(
        `   - ${filePath}: ${describeExtensions(extensions)} (${formatsFromExtensions(extensions).join(' + ')})`
      );
      core.debug(`     Residual path: ${residualPath}`);

      if (isExtensionLikeName(residualPath)) {
        core.warning(
          `'${filePath}' leaves a file named '${residualPath}' after removing ${describeExtensions(extensions)}`
        );
      }
    }

    reports.push({
      path: filePath,
      residualPath,
      extensions: toDisplayTexts(extensions),
      formats: formatsFromExtensions(extensions),
      isArchive: extensions.length > 0 && extensions[0].isArchive(),
    });
  }

  if (failOnUnknown && unknown.length > 0) {
    throw new Error(
      `No known extension in: ${unknown.join(', ')}. ${supportedExtensionsHint()}`
    );
  }

  return reports;
}
