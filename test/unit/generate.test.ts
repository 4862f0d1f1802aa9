import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { jest } from '@jest/globals';
import { generateClient } from '../../src/generate.js';
import type { Runner } from '../../src/shared/exec.js';
import { logger } from '../../src/shared/logger.js';

describe('generateClient', () => {
  let tmpDir: string;
  let scriptDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'gen-api-test-'));
    scriptDir = path.join(tmpDir, 'scripts');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('prints the command before running it', async () => {
    const events: string[] = [];
    const print = jest.fn((line: string) => {
      events.push(`print ${line}`);
    });
    const runner = jest.fn<Runner>().mockImplementation(async (line) => {
      events.push(`run ${line}`);
      return { stdout: '', stderr: '', exitCode: 0 };
    });

    const result = await generateClient({ scriptDir, print, runner });

    const expected =
      'npx @openapitools/openapi-generator-cli generate -g typescript-fetch' +
      ` -i ${tmpDir}/openapi.json -o ${tmpDir}/src/api/generated -c ${tmpDir}/src/api/generated/config.json`;
    expect(events).toEqual([`print ${expected}`, `run ${expected}`]);
    expect(result.command.line).toBe(expected);
    expect(result.exitCode).toBe(0);
  });

  it('hands the terminal to the generator', async () => {
    const runner = jest.fn<Runner>().mockImplementation(async () => ({ stdout: '', stderr: '', exitCode: 0 }));
    await generateClient({ scriptDir, print: () => {}, runner });
    expect(runner).toHaveBeenCalledWith(expect.any(String), { stdio: 'inherit' });
  });

  it('surfaces a non-zero generator exit code', async () => {
    const runner = jest.fn<Runner>().mockImplementation(async () => ({ stdout: '', stderr: '', exitCode: 127 }));
    const result = await generateClient({ scriptDir, print: () => {}, runner });
    expect(result.exitCode).toBe(127);
  });

  it('still runs the generator when the spec is missing', async () => {
    const runner = jest.fn<Runner>().mockImplementation(async () => ({ stdout: '', stderr: '', exitCode: 1 }));
    await generateClient({ scriptDir, print: () => {}, runner });
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it('keeps a clean run quiet at the info level', async () => {
    const info = jest.spyOn(logger, 'info');
    const warn = jest.spyOn(logger, 'warn');
    try {
      const specPath = path.join(tmpDir, 'openapi.json');
      await fs.writeFile(specPath, '{}');
      const runner = jest.fn<Runner>().mockImplementation(async () => ({ stdout: '', stderr: '', exitCode: 0 }));
      await generateClient({ scriptDir, print: () => {}, runner });
      expect(info).not.toHaveBeenCalled();
      expect(warn).not.toHaveBeenCalled();
    } finally {
      info.mockRestore();
      warn.mockRestore();
    }
  });
});
