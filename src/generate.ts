import { buildGenerateCommand } from './generator/command.js';
import { DEFAULT_LAYOUT, type ProjectLayout } from './generator/layout.js';
import { resolveProjectPaths } from './generator/paths.js';
import { preflight } from './generator/preflight.js';
import type { GenerateResult } from './generator/types.js';
import { run, type Runner } from './shared/exec.js';
import { logger } from './shared/logger.js';

export interface GenerateClientOptions {
  /** Directory containing the gen-api entry point; its parent is the project root. */
  scriptDir: string;
  layout?: ProjectLayout;
  runner?: Runner;
  print?: (line: string) => void;
}

function printToStdout(line: string): void {
  process.stdout.write(`${line}\n`);
}

/**
 * Resolves the project paths, prints the generator command line, then runs it in a
 * shell with the caller's stdio, environment and working directory.
 *
 * The returned exit code is the generator's own; nothing is retried.
 */
export async function generateClient(options: GenerateClientOptions): Promise<GenerateResult> {
  const paths = resolveProjectPaths(options.scriptDir, options.layout ?? DEFAULT_LAYOUT);
  logger.debug({ paths }, 'Resolved project paths');

  const command = buildGenerateCommand(paths);
  (options.print ?? printToStdout)(command.line);

  await preflight(paths);

  const runner = options.runner ?? run;
  logger.debug({ outputDir: paths.outputDir }, 'Running OpenAPI generator');
  const result = await runner(command.line, { stdio: 'inherit' });

  if (result.exitCode === 0) {
    logger.debug('Client generation complete');
  } else {
    logger.warn({ exitCode: result.exitCode, signal: result.signal }, 'OpenAPI generator exited with failure');
  }
  return { command, exitCode: result.exitCode, signal: result.signal };
}
