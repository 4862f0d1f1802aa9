import { generateClient, type GenerateClientOptions } from './generate.js';
import { GenApiError } from './shared/errors.js';
import { logger } from './shared/logger.js';

// Returns the process exit code: the generator's own, or 1 when it never started.
export async function main(options: GenerateClientOptions): Promise<number> {
  try {
    const result = await generateClient(options);
    return result.exitCode;
  } catch (err) {
    if (err instanceof GenApiError) {
      logger.error({ code: err.code, context: err.context }, err.message);
      return 1;
    }
    throw err;
  }
}
