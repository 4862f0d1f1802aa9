import fs from 'fs/promises';
import { GenApiError, GenApiErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { GeneratorConfigSchema, type GeneratorConfig } from './layout.js';
import type { ProjectPaths } from './types.js';

export interface PreflightReport {
  specFound: boolean;
  /** null when config.json is absent or unusable. */
  generatorConfig: GeneratorConfig | null;
  problems: GenApiError[];
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function readGeneratorConfig(configPath: string): Promise<GeneratorConfig | null> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw new GenApiError(GenApiErrorCode.INVALID_GENERATOR_CONFIG, `Cannot read generator config: ${configPath}`, {
      cause: String(err),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new GenApiError(GenApiErrorCode.INVALID_GENERATOR_CONFIG, `Generator config is not valid JSON: ${configPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const result = GeneratorConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new GenApiError(GenApiErrorCode.INVALID_GENERATOR_CONFIG, `Generator config must be a JSON object: ${configPath}`, {
      issues: result.error.issues.map(i => i.message),
    });
  }
  return result.data;
}

// Advisory only: findings are logged, and the generator runs regardless.
// The spec file is checked for existence, never opened.
export async function preflight(paths: ProjectPaths): Promise<PreflightReport> {
  const problems: GenApiError[] = [];

  const specFound = await fileExists(paths.specPath);
  if (!specFound) {
    logger.warn({ specPath: paths.specPath }, 'OpenAPI spec not found');
  }

  let generatorConfig: GeneratorConfig | null = null;
  try {
    generatorConfig = await readGeneratorConfig(paths.configPath);
    if (generatorConfig === null) {
      logger.debug({ configPath: paths.configPath }, 'No generator config, using generator defaults');
    } else {
      logger.debug({ options: Object.keys(generatorConfig) }, 'Generator config loaded');
    }
  } catch (err) {
    if (!(err instanceof GenApiError)) throw err;
    problems.push(err);
    logger.warn({ err, context: err.context }, err.message);
  }

  return { specFound, generatorConfig, problems };
}
