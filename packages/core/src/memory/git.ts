import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { AuthenticationError, RepositoryError, TimeoutError } from '@steward/shared';

const execFileAsync = promisify(execFile);

const AUTH_FAILURE_PATTERNS = [
  /authentication failed/i,
  /invalid username or (password|token)/i,
  /could not read username/i,
  /terminal prompts disabled/i,
  /permission denied \(publickey\)/i,
  /http basic: access denied/i,
  /the requested url returned error: 40[13]/i,
  /repository not found/i,
];

export interface GitRunOptions {
  cwd?: string;
  timeoutMs: number;
}

export type GitRunner = (args: string[], options: GitRunOptions) => Promise<string>;

export function isAuthFailure(stderr: string): boolean {
  return AUTH_FAILURE_PATTERNS.some(p => p.test(stderr));
}

/** Strip `user:token@` from anything git echoes back. */
export function redactCredentials(text: string): string {
  return text.replace(/(\w+:\/\/)[^/@\s]+@/g, '$1***@');
}

/**
 * Runs git without ever prompting for credentials, bounded by a timeout.
 * Failures are mapped to AuthenticationError, TimeoutError or RepositoryError.
 */
export const runGit: GitRunner = async (args, options) => {
  try {
    const { stdout } = await execFileAsync('git', args, {
      cwd: options.cwd,
      encoding: 'utf8',
      timeout: options.timeoutMs,
      maxBuffer: 16 * 1024 * 1024,
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0', GIT_ASKPASS: 'echo', LC_ALL: 'C' },
    });
    return stdout.trim();
  } catch (err) {
    const stderr = redactCredentials(readStringField(err, 'stderr'));
    const command = `git ${args.find(a => !a.startsWith('-') && !a.includes('=')) ?? ''}`;
    // The raw error is not kept as the cause: its message echoes the command line, token included.
    if (isKilled(err)) {
      throw new TimeoutError('memory', options.timeoutMs);
    }
    if (isAuthFailure(stderr)) {
      throw new AuthenticationError('memory', `${command}: ${firstLine(stderr)}`);
    }
    const detail = firstLine(stderr) || firstLine(redactCredentials(readStringField(err, 'message')));
    throw new RepositoryError(`${command} failed: ${detail}`);
  }
};

function readStringField(err: unknown, field: 'stderr' | 'message'): string {
  if (typeof err === 'object' && err !== null && field in err) {
    const value: unknown = Reflect.get(err, field);
    return typeof value === 'string' ? value : '';
  }
  return '';
}

function isKilled(err: unknown): boolean {
  return typeof err === 'object' && err !== null && Reflect.get(err, 'killed') === true;
}

function firstLine(text: string): string {
  const lines = text.split('\n').map(l => l.trim()).filter(Boolean);
  // git prefixes the useful line with "fatal:" after any progress chatter
  return lines.find(l => l.startsWith('fatal:') || l.startsWith('error:')) ?? lines[0] ?? '';
}
