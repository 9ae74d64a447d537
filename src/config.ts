/**
 * Action inputs
 */

import * as core from '@actions/core';
import {parseMultilineInput} from './utils';

export interface ActionConfig {
  /**
   * Dotted format string such as "tar.gz"; empty when not given
   */
  format: string;
  paths: string[];
  resolveGlobs: boolean;
  failOnUnknown: boolean;
}

function readBooleanInput(name: string, defaultValue: boolean): boolean {
  // getBooleanInput rejects an empty value
  return core.getInput(name) ? core.getBooleanInput(name) : defaultValue;
}

/**
 * Read and validate the action inputs
 */
export function readConfig(): ActionConfig {
  const format = core.getInput('format');
  const paths = parseMultilineInput(core.getInput('path'));

  if (!format && paths.length === 0) {
    throw new Error("Either 'format' or 'path' input must be provided");
  }

  const config: ActionConfig = {
    format,
    paths,
    resolveGlobs: readBooleanInput('resolve-globs', false),
    failOnUnknown: readBooleanInput('fail-on-unknown', false),
  };

  core.debug('Configuration:');
  core.debug(`  Format: ${config.format || '(none)'}`);
  core.debug(`  Paths: ${config.paths.length}`);
  core.debug(`  Resolve globs: ${config.resolveGlobs}`);
  core.debug(`  Fail on unknown: ${config.failOnUnknown}`);

  return config;
}
