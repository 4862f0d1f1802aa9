export interface ProjectPaths {
  scriptDir: string;
  projectRoot: string;
  specPath: string;
  outputDir: string;
  configPath: string;
}

export interface GenerateCommand {
  executable: string;
  args: string[];
  /** Exact text printed and handed to the shell. */
  line: string;
}

export interface GenerateResult {
  command: GenerateCommand;
  exitCode: number;
  signal?: string;
}
