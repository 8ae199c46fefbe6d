import { existsSync } from 'node:fs';
import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname, join, posix, resolve } from 'node:path';
import {
  type ApplyChangesResult,
  type DynamicMemoryDocument,
  type MemoryDraft,
  type MemoryEntry,
  type MemoryNote,
  type MemoryRecord,
  DYNAMIC_MEMORY_FILE,
  NOTE_EXTENSIONS,
  RepositoryError,
  compactTimestamp,
  dynamicMemorySchema,
  errorMessage,
  isoNow,
  maskUrl,
  memoryRecordSchema,
  randomHex,
  truncate,
} from '@steward/shared';
import type { Logger } from '../logger.js';
import { runGit, type GitRunner } from './git.js';

export interface MemoryRepositoryOptions {
  repoUrl: string;
  token?: string;
  localPath: string;
  memoriesDir: string;
  timeoutMs: number;
  maxNoteLength: number;
  author: { name: string; email: string };
  logger: Logger;
  git?: GitRunner;
}

/** A non-entry file written in the same commit as entry changes. */
export interface RepositoryDocument {
  path: string;
  content: string;
}

export interface ApplyChangesOptions {
  message?: string;
  documents?: RepositoryDocument[];
}

export function toRecord(entry: MemoryEntry): MemoryRecord {
  return {
    content: entry.content,
    source: entry.source,
    timestamp: entry.timestamp,
    user: entry.user,
    related_question: entry.relatedQuestion,
    ...(entry.embedding ? { embedding: entry.embedding } : {}),
  };
}

export function fromRecord(id: string, record: MemoryRecord): MemoryEntry {
  return {
    id,
    content: record.content,
    source: record.source,
    timestamp: record.timestamp,
    user: record.user,
    relatedQuestion: record.related_question,
    ...(record.embedding ? { embedding: record.embedding } : {}),
  };
}

/** Inserts the token into an https remote; other remotes are returned untouched. */
export function authenticatedUrl(repoUrl: string, token?: string): string {
  if (!token) return repoUrl;
  let url: URL;
  try {
    url = new URL(repoUrl);
  } catch {
    return repoUrl;
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') return repoUrl;
  url.username = 'x-access-token';
  url.password = token;
  return url.toString();
}

function normalizeRemote(remote: string): string {
  let value = remote.trim();
  try {
    const url = new URL(value);
    url.username = '';
    url.password = '';
    value = url.toString();
  } catch {
    value = resolve(value);
  }
  return value.replace(/\/+$/, '').replace(/\.git$/, '');
}

export function sameRemote(a: string, b: string): boolean {
  return normalizeRemote(a) === normalizeRemote(b);
}

/**
 * Owns the local working copy of the memory repository. It is the only
 * writer: entries are files under `memoriesDir`, every change is a commit
 * that is pushed before the call returns, and mutations are serialized.
 */
export class MemoryRepositoryManager {
  private queue: Promise<unknown> = Promise.resolve();
  private readonly git: GitRunner;
  private readonly logger: Logger;
  readonly localPath: string;

  constructor(private readonly options: MemoryRepositoryOptions) {
    this.git = options.git ?? runGit;
    this.logger = options.logger.child({ component: 'memory-repository' });
    this.localPath = resolve(options.localPath);
  }

  /** Pulls an existing working copy of the configured remote, or clones a fresh one. */
  ensureReady(): Promise<string> {
    return this.serialize(() => this.syncWorkingCopy());
  }

  async loadEntries(): Promise<MemoryEntry[]> {
    const dir = join(this.localPath, this.options.memoriesDir);
    if (!existsSync(dir)) return [];

    const files = (await readdir(dir)).filter(f => f.endsWith('.json')).sort();
    const entries: MemoryEntry[] = [];
    for (const file of files) {
      const id = posix.join(this.options.memoriesDir, file);
      const entry = await this.readEntry(id);
      if (entry) entries.push(entry);
    }
    this.logger.debug({ count: entries.length }, 'Loaded memory entries');
    return entries;
  }

  /** Freeform `.md`/`.txt` files and the integrated dynamic memory, outside the entries directory. */
  async loadNotes(): Promise<MemoryNote[]> {
    if (!existsSync(this.localPath)) return [];
    const notes: MemoryNote[] = [];

    for (const path of await this.walk('')) {
      if (!NOTE_EXTENSIONS.some(ext => path.toLowerCase().endsWith(ext))) continue;
      const content = (await readFile(join(this.localPath, path), 'utf-8')).trim();
      if (content) {
        notes.push({ path, content: truncate(content, this.options.maxNoteLength) });
      }
    }

    const dynamic = await this.readDynamicMemory();
    if (dynamic?.integrated_info.trim()) {
      notes.push({
        path: DYNAMIC_MEMORY_FILE,
        content: truncate(dynamic.integrated_info.trim(), this.options.maxNoteLength),
      });
    }
    return notes;
  }

  async readDynamicMemory(): Promise<DynamicMemoryDocument | null> {
    const file = join(this.localPath, DYNAMIC_MEMORY_FILE);
    if (!existsSync(file)) return null;
    try {
      const parsed = dynamicMemorySchema.safeParse(JSON.parse(await readFile(file, 'utf-8')));
      if (parsed.success) return parsed.data;
      this.logger.warn({ file: DYNAMIC_MEMORY_FILE }, 'Dynamic memory document has an unexpected shape, ignoring it');
    } catch (err) {
      this.logger.warn({ file: DYNAMIC_MEMORY_FILE, err: errorMessage(err) }, 'Could not read dynamic memory document');
    }
    return null;
  }

  /** Turns an analyzer draft into an entry with a fresh file id. */
  createEntry(draft: MemoryDraft, embedding?: number[], now: Date = new Date()): MemoryEntry {
    const stamp = compactTimestamp(now);
    return {
      id: posix.join(this.options.memoriesDir, `memory_${stamp}_${randomHex(3)}.json`),
      content: draft.content,
      source: `interaction_${stamp}`,
      timestamp: now.toISOString(),
      user: draft.user,
      relatedQuestion: draft.relatedQuestion,
      ...(embedding ? { embedding } : {}),
    };
  }

  /**
   * Writes every create and delete, commits and pushes, or changes nothing:
   * any failure resets the working copy to the commit it started from.
   */
  applyChanges(
    creates: MemoryEntry[],
    deletes: MemoryEntry[],
    options: ApplyChangesOptions = {},
  ): Promise<ApplyChangesResult> {
    return this.serialize(() => this.commitChanges(creates, deletes, options));
  }

  private async syncWorkingCopy(): Promise<string> {
    const { repoUrl, timeoutMs } = this.options;
    const remote = authenticatedUrl(repoUrl, this.options.token);
    const path = this.localPath;

    if (existsSync(join(path, '.git'))) {
      const current = await this.git(['remote', 'get-url', 'origin'], { cwd: path, timeoutMs });
      if (sameRemote(current, repoUrl)) {
        if (current !== remote) {
          await this.git(['remote', 'set-url', 'origin', remote], { cwd: path, timeoutMs });
        }
        await this.pull();
        this.logger.info({ path }, 'Memory repository updated');
        return path;
      }
      this.logger.warn(
        { path, expected: maskUrl(repoUrl), found: maskUrl(current) },
        'Working copy tracks a different remote, cloning again',
      );
      await rm(path, { recursive: true, force: true });
    } else if (existsSync(path) && (await readdir(path)).length > 0) {
      throw new RepositoryError(`${path} exists and is not a git working copy`);
    }

    await mkdir(dirname(path), { recursive: true });
    this.logger.info({ url: maskUrl(repoUrl), path }, 'Cloning memory repository');
    await this.git(['clone', remote, path], { cwd: dirname(path), timeoutMs });
    return path;
  }

  private async pull(): Promise<void> {
    const { timeoutMs } = this.options;
    const cwd = this.localPath;
    const heads = await this.git(['ls-remote', '--heads', 'origin'], { cwd, timeoutMs });
    if (!heads) {
      this.logger.debug('Remote has no branches yet, nothing to pull');
      return;
    }
    const branch = await this.git(['symbolic-ref', '--short', 'HEAD'], { cwd, timeoutMs });
    await this.git(['pull', '--ff-only', 'origin', branch], { cwd, timeoutMs });
  }

  private async commitChanges(
    creates: MemoryEntry[],
    deletes: MemoryEntry[],
    options: ApplyChangesOptions,
  ): Promise<ApplyChangesResult> {
    const documents = options.documents ?? [];
    if (creates.length === 0 && deletes.length === 0 && documents.length === 0) {
      return { committed: false, created: [], deleted: [] };
    }

    this.validateChanges(creates, deletes, documents);

    const { timeoutMs, author } = this.options;
    const cwd = this.localPath;
    const headBefore = await this.headCommit();
    const newFiles = [
      ...creates.map(e => e.id),
      ...documents.map(d => d.path).filter(p => !existsSync(join(cwd, p))),
    ];
    let committed = false;

    try {
      await mkdir(join(cwd, this.options.memoriesDir), { recursive: true });
      for (const entry of creates) {
        await writeFile(join(cwd, entry.id), JSON.stringify(toRecord(entry), null, 2) + '\n', 'utf-8');
      }
      for (const doc of documents) {
        await mkdir(dirname(join(cwd, doc.path)), { recursive: true });
        await writeFile(join(cwd, doc.path), doc.content, 'utf-8');
      }

      if (deletes.length > 0) {
        await this.git(['rm', '--quiet', '--', ...deletes.map(e => e.id)], { cwd, timeoutMs });
      }
      const added = [...creates.map(e => e.id), ...documents.map(d => d.path)];
      if (added.length > 0) {
        await this.git(['add', '--', ...added], { cwd, timeoutMs });
      }

      const message = `${options.message ?? `Update memories (+${creates.length}/-${deletes.length})`}\n\nTimestamp: ${isoNow()}`;
      await this.git(
        ['-c', `user.name=${author.name}`, '-c', `user.email=${author.email}`, 'commit', '--quiet', '-m', message],
        { cwd, timeoutMs },
      );
      committed = true;
      await this.git(['push', '--quiet', 'origin', 'HEAD'], { cwd, timeoutMs });
    } catch (err) {
      await this.rollback(headBefore, newFiles, committed);
      throw err;
    }

    const commit = await this.git(['rev-parse', 'HEAD'], { cwd, timeoutMs });
    this.logger.info(
      { commit, created: creates.length, deleted: deletes.length, documents: documents.length },
      'Memory changes pushed',
    );
    return {
      committed: true,
      created: creates.map(e => e.id),
      deleted: deletes.map(e => e.id),
      commit,
    };
  }

  private validateChanges(creates: MemoryEntry[], deletes: MemoryEntry[], documents: RepositoryDocument[]): void {
    for (const entry of creates) {
      this.assertEntryPath(entry.id);
      if (existsSync(join(this.localPath, entry.id))) {
        throw new RepositoryError(`refusing to overwrite existing memory ${entry.id}`);
      }
      const parsed = memoryRecordSchema.safeParse(toRecord(entry));
      if (!parsed.success) {
        throw new RepositoryError(`invalid memory ${entry.id}: ${parsed.error.issues.map(i => i.message).join(', ')}`);
      }
    }
    for (const entry of deletes) {
      this.assertEntryPath(entry.id);
      if (!existsSync(join(this.localPath, entry.id))) {
        throw new RepositoryError(`cannot delete missing memory ${entry.id}`);
      }
    }
    for (const doc of documents) {
      if (!isSafeRelativePath(doc.path) || doc.path.startsWith('.git/')) {
        throw new RepositoryError(`invalid document path ${doc.path}`);
      }
    }
  }

  private assertEntryPath(id: string): void {
    const prefix = `${this.options.memoriesDir}/`;
    if (!id.startsWith(prefix) || !id.endsWith('.json') || !isSafeRelativePath(id) || id.slice(prefix.length).includes('/')) {
      throw new RepositoryError(`invalid memory id ${id}`);
    }
  }

  private async headCommit(): Promise<string | undefined> {
    try {
      return await this.git(['rev-parse', '--verify', 'HEAD'], { cwd: this.localPath, timeoutMs: this.options.timeoutMs });
    } catch (err) {
      if (err instanceof RepositoryError) {
        // Unborn branch: the remote had no commits when it was cloned.
        return undefined;
      }
      throw err;
    }
  }

  private async rollback(headBefore: string | undefined, newFiles: string[], committed: boolean): Promise<void> {
    const { timeoutMs } = this.options;
    const cwd = this.localPath;
    try {
      for (const file of newFiles) {
        await rm(join(cwd, file), { force: true });
      }
      if (headBefore) {
        await this.git(['reset', '--quiet', '--hard', headBefore], { cwd, timeoutMs });
      } else {
        if (committed) {
          await this.git(['update-ref', '-d', 'HEAD'], { cwd, timeoutMs });
        }
        if (newFiles.length > 0) {
          await this.git(['rm', '-r', '--cached', '--quiet', '--ignore-unmatch', '--', ...newFiles], { cwd, timeoutMs });
        }
      }
      this.logger.warn({ headBefore }, 'Memory changes rolled back');
    } catch (err) {
      this.logger.error({ err: errorMessage(err) }, 'Rollback of memory changes failed; working copy needs a fresh clone');
    }
  }

  private async readEntry(id: string): Promise<MemoryEntry | null> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(join(this.localPath, id), 'utf-8'));
    } catch (err) {
      this.logger.warn({ id, err: errorMessage(err) }, 'Skipping unreadable memory file');
      return null;
    }
    const parsed = memoryRecordSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ id }, 'Skipping memory file that does not match the entry format');
      return null;
    }
    return fromRecord(id, parsed.data);
  }

  private async walk(relative: string): Promise<string[]> {
    const dir = join(this.localPath, relative);
    const found: string[] = [];
    for (const dirent of await readdir(dir, { withFileTypes: true })) {
      const path = relative ? posix.join(relative, dirent.name) : dirent.name;
      if (dirent.isDirectory()) {
        if (dirent.name === '.git' || path === this.options.memoriesDir) continue;
        found.push(...(await this.walk(path)));
      } else if (dirent.isFile()) {
        found.push(path);
      }
    }
    return found.sort();
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // The chain only orders tasks; callers see failures through `run`.
    this.queue = run.catch(() => undefined);
    return run;
  }
}

function isSafeRelativePath(path: string): boolean {
  return !path.startsWith('/') && !path.split('/').includes('..') && !path.includes('\\');
}
