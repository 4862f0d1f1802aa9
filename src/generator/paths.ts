import path from 'path';
import { DEFAULT_LAYOUT, ProjectLayoutSchema, type ProjectLayout } from './layout.js';
import type { ProjectPaths } from './types.js';

/**
 * Derives every path the generator needs from the directory holding the entry point.
 * The working directory is never consulted, so the project can be moved or invoked
 * from anywhere.
 */
export function resolveProjectPaths(scriptDir: string, layout: ProjectLayout = DEFAULT_LAYOUT): ProjectPaths {
  const { specFile, outputDir, configFile } = ProjectLayoutSchema.parse(layout);
  const absScriptDir = path.resolve(scriptDir);
  const projectRoot = path.dirname(absScriptDir);
  const generated = path.join(projectRoot, ...outputDir.split('/'));

  return {
    scriptDir: absScriptDir,
    projectRoot,
    specPath: path.join(projectRoot, specFile),
    outputDir: generated,
    configPath: path.join(generated, configFile),
  };
}
