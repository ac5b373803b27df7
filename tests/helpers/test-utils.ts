import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { Logger } from '../../src/observability/logger.js';
import { run } from '../../src/cli/main.js';

export class TestProject {
  public readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  static create(): TestProject {
    return new TestProject(fs.mkdtempSync(path.join(os.tmpdir(), 'argsift-test-')));
  }

  writeFile(filename: string, content: string): void {
    const filepath = path.join(this.dir, filename);
    fs.mkdirSync(path.dirname(filepath), { recursive: true });
    fs.writeFileSync(filepath, content, 'utf-8');
  }

  writeJson(filename: string, data: unknown): void {
    this.writeFile(filename, JSON.stringify(data, null, 2));
  }

  destroy(): void {
    if (fs.existsSync(this.dir)) {
      fs.rmSync(this.dir, { recursive: true, force: true });
    }
  }
}

export function silentLogger(): Logger {
  return new Logger({ level: 'silent', json: false });
}

export function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({ level: 'debug', json: true, write: (line) => lines.push(line) });
  return { logger, lines };
}

export interface CLIResult {
  exitCode: number;
  stdout: string[];
  stderr: string[];
}

// Runs the CLI in-process with captured output and a clean environment
export async function runCLI(
  args: string[],
  options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<CLIResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];

  const exitCode = await run(args, {
    cwd: options.cwd,
    env: { ARGSIFT_COLOR: 'false', ARGSIFT_LOG_LEVEL: 'silent', ...options.env },
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
  });

  return { exitCode, stdout, stderr };
}
