import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CliIO, OutputStream } from '../../cli/src/types/cli';
import { run } from '../../cli/src/program';
import { FetchMock } from './fetch.mock';

export class CapturedStream implements OutputStream {
  chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

export function makeTempDir(prefix = 'xbe-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export interface RunResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Run the CLI in process against a fetch mock, with the config home pointed
 * at a temp directory and colour off.
 */
export async function runCli(
  argv: string[],
  options: { fetchMock?: FetchMock; configHome: string; env?: NodeJS.ProcessEnv }
): Promise<RunResult> {
  const stdout = new CapturedStream();
  const stderr = new CapturedStream();
  const io: CliIO = {
    stdout,
    stderr,
    env: {
      XBE_CONFIG_HOME: options.configHome,
      XBE_BASE_URL: 'https://api.test',
      XBE_LOG_LEVEL: 'error',
      ...options.env
    },
    color: false,
    fetchImplementation: options.fetchMock?.fetch
  };
  const code = await run(argv, io);
  return { code, stdout: stdout.text, stderr: stderr.text };
}
