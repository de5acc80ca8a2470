/**
 * Build Integration Shim
 * Runs the pipeline and commits the generated files all-or-nothing
 */

import * as fs from 'fs';
import * as path from 'path';
import { SchemaSource } from '../core/schemaSource';
import { deleteFile, readFileIfExists, writeFile } from '../utils/fsUtils';
import { logger } from '../utils/logger';
import { CompilerOptions } from '../utils/types';
import { compile } from './compile';

export interface BuildResult {
  /** Absolute paths of files written by this run */
  written: string[];
  /** Absolute paths of files whose content was already up to date */
  unchanged: string[];
}

const STAGING_SUFFIX = '.tmp';

interface StagedFile {
  temporary: string;
  target: string;
  /** Content the target had before this run, undefined when it did not exist */
  previous?: string;
}

/**
 * Put already renamed targets back to their content before the run
 */
function restore(committed: StagedFile[]): void {
  for (const { target, previous } of committed.reverse()) {
    if (previous === undefined) {
      deleteFile(target);
    } else {
      writeFile(target, previous);
    }
  }
}

/**
 * Compile the entries and write the output under `options.outputDirectory`.
 * Every file is staged next to its target and renamed into place only once
 * all of them are staged. On failure staged files are removed, targets
 * already renamed get their previous content back, and the error propagates.
 */
export function runBuild(entryPaths: string[], options: CompilerOptions, source?: SchemaSource): BuildResult {
  const start = Date.now();
  const files = compile(entryPaths, options, source);
  const outputDirectory = path.resolve(options.outputDirectory);

  const result: BuildResult = { written: [], unchanged: [] };
  const staged: StagedFile[] = [];
  const committed: StagedFile[] = [];

  try {
    for (const file of files) {
      const target = path.join(outputDirectory, file.outputPath);
      const previous = readFileIfExists(target);
      if (previous === file.content) {
        result.unchanged.push(target);
        continue;
      }
      const temporary = target + STAGING_SUFFIX;
      writeFile(temporary, file.content);
      staged.push({ temporary, target, previous });
    }

    while (staged.length > 0) {
      const next = staged[0];
      fs.renameSync(next.temporary, next.target);
      staged.shift();
      committed.push(next);
      result.written.push(next.target);
      logger.verbose(`Wrote ${next.target}`);
    }
  } catch (error) {
    for (const { temporary } of staged) {
      deleteFile(temporary);
    }
    restore(committed);
    logger.errorWithContext('Writing generated files failed', { operation: 'build', error });
    throw error;
  }

  logger.info(
    `Generated ${result.written.length} file(s), ${result.unchanged.length} unchanged, in ${Date.now() - start}ms`
  );
  return result;
}
