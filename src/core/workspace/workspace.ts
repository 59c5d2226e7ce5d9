import { promises as fs } from 'node:fs';
import { isAbsolute, join, normalize, resolve, sep } from 'node:path';
import { WorkspaceError } from '../errors.js';

export interface WorkspaceLease {
  readonly path: string;
  /** Idempotent. */
  release(): void;
}

export interface WorkspaceProvider {
  acquireWorkingDirectory(project?: string, branch?: string, signal?: AbortSignal): Promise<WorkspaceLease>;
}

export interface ProjectEntry {
  path: string;
  worktreesDir?: string;
}

export interface DirectoryWorkspaceOptions {
  projects: Record<string, ProjectEntry>;
  defaultProject?: string;
  /** Used when no project is configured or requested. */
  fallbackDirectory: string;
}

interface PathLock {
  held: boolean;
  waiters: Array<() => void>;
}

const BRANCH_RE = /^[A-Za-z0-9._\/-]+$/;

/**
 * Maps configured projects (and their worktrees) to directories and hands out
 * one exclusive lease per resolved path. Worktrees are looked up, never
 * created: a branch resolves to `<worktreesDir>/<branch>`, which must exist.
 */
export class DirectoryWorkspaceProvider implements WorkspaceProvider {
  private readonly locks = new Map<string, PathLock>();

  constructor(private options: DirectoryWorkspaceOptions) {}

  configure(options: DirectoryWorkspaceOptions): void {
    this.options = options;
  }

  isLeased(path: string): boolean {
    return this.locks.get(resolve(path))?.held ?? false;
  }

  async acquireWorkingDirectory(project?: string, branch?: string, signal?: AbortSignal): Promise<WorkspaceLease> {
    const path = await this.resolvePath(project, branch);
    await this.lock(path, signal);
    let released = false;
    return {
      path,
      release: () => {
        if (released) return;
        released = true;
        this.unlock(path);
      }
    };
  }

  async resolvePath(project?: string, branch?: string): Promise<string> {
    const name = project ?? this.options.defaultProject;
    let root: string;
    let worktreesDir: string | undefined;
    if (name === undefined) {
      root = resolve(this.options.fallbackDirectory);
    } else {
      const entry = this.options.projects[name];
      if (!entry) {
        throw new WorkspaceError(`unknown project: ${name}`);
      }
      root = resolve(entry.path);
      worktreesDir = entry.worktreesDir;
    }

    let path = root;
    if (branch) {
      if (!BRANCH_RE.test(branch) || branch.split('/').includes('..')) {
        throw new WorkspaceError(`invalid branch name: ${branch}`);
      }
      const base = worktreesDir
        ? isAbsolute(worktreesDir) ? worktreesDir : join(root, worktreesDir)
        : join(root, '.worktrees');
      path = resolve(base, normalize(branch));
      if (!path.startsWith(resolve(base) + sep)) {
        throw new WorkspaceError(`invalid branch name: ${branch}`);
      }
    }

    const stat = await fs.stat(path).catch(() => undefined);
    if (!stat?.isDirectory()) {
      throw new WorkspaceError(branch ? `worktree for ${branch} not found at ${path}` : `directory not found: ${path}`);
    }
    return path;
  }

  private lock(path: string, signal?: AbortSignal): Promise<void> {
    const lock = this.locks.get(path) ?? { held: false, waiters: [] };
    this.locks.set(path, lock);
    if (!lock.held) {
      lock.held = true;
      return Promise.resolve();
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    return new Promise<void>((resolvePromise, reject) => {
      const grant = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolvePromise();
      };
      const onAbort = (): void => {
        lock.waiters = lock.waiters.filter((waiter) => waiter !== grant);
        reject(signal?.reason);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      lock.waiters.push(grant);
    });
  }

  private unlock(path: string): void {
    const lock = this.locks.get(path);
    if (!lock) return;
    const next = lock.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.locks.delete(path);
  }
}
