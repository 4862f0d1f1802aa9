import type { GenerateCommand, ProjectPaths } from './types.js';

export const PACKAGE_RUNNER = 'npx';
export const GENERATOR_PACKAGE = '@openapitools/openapi-generator-cli';
export const GENERATOR_NAME = 'typescript-fetch';

export function buildGenerateCommand(paths: ProjectPaths): GenerateCommand {
  const args = [
    GENERATOR_PACKAGE,
    'generate',
    '-g', GENERATOR_NAME,
    '-i', paths.specPath,
    '-o', paths.outputDir,
    '-c', paths.configPath,
  ];
  // Paths go in verbatim; one containing spaces or shell metacharacters breaks the line.
  return {
    executable: PACKAGE_RUNNER,
    args,
    line: [PACKAGE_RUNNER, ...args].join(' '),
  };
}
