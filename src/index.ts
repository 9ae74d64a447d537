import * as core from '@actions/core';
import {readConfig} from './config';
import {resolveFormat, resolvePaths, supportedExtensionsHint} from './resolve';
import {resolveGlobPaths} from './utils';

export async function run(): Promise<void> {
  try {
    core.info('🚀 Compression Extensions Action');
    core.debug(`Running on: ${process.platform} ${process.arch}`);
    core.debug(`Node version: ${process.version}`);

    const config = readConfig();

    if (config.format) {
      const report = resolveFormat(config.format);
      core.setOutput('formats', JSON.stringify(report.formats));
      core.setOutput('extensions', JSON.stringify(report.extensions));
      core.setOutput('is-archive', report.isArchive.toString());
    }

    if (config.paths.length > 0) {
      const paths = config.resolveGlobs
        ? await resolveGlobPaths(config.paths)
        : config.paths;

      if (paths.length === 0) {
        core.warning('No files matched the provided patterns');
      }

      const reports = resolvePaths(paths, config.failOnUnknown);
      core.setOutput('paths', JSON.stringify(reports));
    }

    core.info('✅ Done');
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    core.setFailed(`❌ Extension resolution failed: ${errorMsg}`);

    if (error instanceof Error && error.stack) {
      core.debug('Stack trace:');
      core.debug(error.stack);
    }

    if (errorMsg.includes('Unsupported format') || errorMsg.includes('No known extension')) {
      core.error('');
      core.error('Extensions are matched exactly and case-sensitively.');
      core.error(supportedExtensionsHint());
    }
  }
}

if (require.main === module) {
  void run();
}
