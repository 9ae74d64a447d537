import * as core from '@actions/core';
import * as glob from '@actions/glob';

/**
 * Split a multiline input into trimmed, non-empty entries
 */
export function parseMultilineInput(value: string): string[] {
  return value
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Resolve glob patterns to actual file paths
 */
export async function resolveGlobPaths(patterns: string[]): Promise<string[]> {
  core.debug(`Resolving ${patterns.length} glob patterns`);

  const resolvedPaths: string[] = [];

  for (const pattern of patterns) {
    try {
      core.debug(`  Processing pattern: ${pattern}`);

      const globber = await glob.create(pattern.trim(), {
        followSymbolicLinks: false,
      });
      const files = await globber.glob();

      if (files.length > 0) {
        core.debug(`    Matched ${files.length} files`);
        resolvedPaths.push(...files);
      } else {
        core.debug(`    No files matched this pattern`);
      }
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      core.warning(`Failed to resolve pattern "${pattern}": ${errorMsg}`);

      if (errorMsg.includes('Permission denied') || errorMsg.includes('EACCES')) {
        core.warning('  - Check file/directory permissions');
        core.warning('  - Pattern may reference inaccessible location');
      }
    }
  }

  const uniquePaths = [...new Set(resolvedPaths)];
  core.debug(`  Total unique paths resolved: ${uniquePaths.length}`);

  return uniquePaths;
}
