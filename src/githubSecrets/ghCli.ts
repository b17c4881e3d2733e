/**
 * Requirements addressed:
 * - Upload through an authenticated GitHub CLI session as an alternative to
 *   the token + REST path.
 * - Fail fast with `MissingDependency` when `gh` is not installed or not
 *   logged in.
 * - Secret values travel on stdin, never in process arguments.
 */

import { spawn } from 'node:child_process';

import type { EnvEntry, PutMode } from './envEntry';
import type { Logger } from './GithubSecretsClient';
import { describeError, UploaderError } from './uploaderError';

export type RunResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (
  cmd: string,
  args: string[],
  opts?: { input?: string; env?: NodeJS.ProcessEnv },
) => Promise<RunResult>;

/**
 * Spawn a process and collect its output. Spawn errors (e.g. ENOENT) reject.
 */
export const runProcess: CommandRunner = async (cmd, args, opts = {}) =>
  await new Promise<RunResult>((resolve, reject) => {
    const child = spawn(cmd, args, {
      env: opts.env ?? process.env,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    child.stdout.on('data', (d) => (stdout += String(d)));
    child.stderr.on('data', (d) => (stderr += String(d)));
    child.on('error', reject);
    child.on('close', (code) => {
      resolve({ code: typeof code === 'number' ? code : 1, stdout, stderr });
    });

    // EPIPE: the child exited without reading all of stdin; `close` still
    // reports its exit code.
    child.stdin.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code !== 'EPIPE') reject(err);
    });
    child.stdin.end(opts.input ?? '');
  });

const firstLine = (s: string): string => s.trim().split(/\r?\n/)[0] ?? '';

/**
 * Secret writes via `gh secret set`.
 */
export class GhCli {
  readonly #run: CommandRunner;
  readonly #logger: Logger;
  readonly #repository: string;

  constructor({
    repository,
    logger = console,
    run = runProcess,
  }: {
    repository: string;
    logger?: Logger;
    run?: CommandRunner;
  }) {
    this.#repository = repository;
    this.#logger = logger;
    this.#run = run;
  }

  /**
   * Verify `gh` is installed and has an authenticated session.
   *
   * @throws `MissingDependency`
   */
  async assertReady(): Promise<void> {
    let version: RunResult;
    try {
      version = await this.#run('gh', ['--version']);
    } catch (err) {
      throw new UploaderError(
        'MissingDependency',
        `gh is required. Install it from https://cli.github.com (${describeError(err)}).`,
        { cause: err },
      );
    }
    if (version.code !== 0) {
      throw new UploaderError(
        'MissingDependency',
        'gh is required. Install it from https://cli.github.com.',
      );
    }
    this.#logger.debug('Found gh.', { version: firstLine(version.stdout) });

    const auth = await this.#run('gh', ['auth', 'status']);
    if (auth.code !== 0) {
      const detail = firstLine(auth.stderr) || firstLine(auth.stdout);
      throw new UploaderError(
        'MissingDependency',
        `gh is not authenticated. Run 'gh auth login'.${detail ? ` (${detail})` : ''}`,
      );
    }
  }

  /**
   * Set a repository secret. `gh` seals the value itself.
   *
   * @returns Always `'updated'`: the CLI does not report create vs update.
   * @throws `UploadFailure` with the CLI's stderr.
   */
  async setSecret({ name, value }: EnvEntry): Promise<PutMode> {
    this.#logger.debug('Setting secret via gh...', { name });

    let res: RunResult;
    try {
      res = await this.#run(
        'gh',
        ['secret', 'set', name, '--repo', this.#repository],
        { input: value },
      );
    } catch (err) {
      throw new UploaderError('UploadFailure', describeError(err), {
        cause: err,
      });
    }

    if (res.code !== 0) {
      throw new UploaderError(
        'UploadFailure',
        res.stderr.trim() || `gh exited with code ${String(res.code)}`,
      );
    }
    return 'updated';
  }
}
