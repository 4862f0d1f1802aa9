import { z } from 'zod';

// Offsets from the project root. The root itself is always the parent of the
// directory holding the gen-api entry point.
export const ProjectLayoutSchema = z.object({
  specFile: z.string().min(1),
  outputDir: z.string().min(1),
  // Relative to outputDir.
  configFile: z.string().min(1),
});

export type ProjectLayout = z.infer<typeof ProjectLayoutSchema>;

export const DEFAULT_LAYOUT: ProjectLayout = {
  specFile: 'openapi.json',
  outputDir: 'src/api/generated',
  configFile: 'config.json',
};

// Options the typescript-fetch generator reads from config.json (additionalProperties).
export const GeneratorConfigSchema = z.record(z.string(), z.unknown());

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;
