import { join, resolve, relative, isAbsolute, basename, sep } from 'path';
import { mkdir, rm, rename, readdir, access, stat, cp } from 'fs/promises';
import { constants } from 'fs';
import type { Logger } from '../utils/logger.js';
import { validateSessionId } from '../utils/sessionValidation.js';
import {
  AlreadyExistsError,
  InvalidArgumentError,
  ResourceExhaustedError,
  WorkspaceRootUnavailableError,
  errorMessage
} from '../errors.js';

const EXHAUSTION_CODES = new Set(['ENOSPC', 'EDQUOT', 'EMFILE', 'ENFILE']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Owns the per-session directories under a single root. Nothing outside
 * `root` (and `archiveRoot`, for retained workspaces) is ever touched.
 */
export class WorkspaceManager {
  readonly root: string;
  readonly archiveRoot: string;

  constructor(root: string, archiveRoot: string, private logger?: Logger) {
    this.root = resolve(root);
    this.archiveRoot = resolve(archiveRoot);
  }

  /**
   * Creates the workspace and archive roots and checks that the workspace
   * root is writable. Throws WorkspaceRootUnavailableError otherwise.
   */
  async initialize(): Promise<void> {
    try {
      await mkdir(this.root, { recursive: true });
      await access(this.root, constants.W_OK | constants.X_OK);
      const info = await stat(this.root);
      if (!info.isDirectory()) {
        throw new Error('not a directory');
      }
      await mkdir(this.archiveRoot, { recursive: true });
    } catch (error) {
      throw new WorkspaceRootUnavailableError(this.root, errorMessage(error));
    }
    this.logger?.verbose(`Workspace root ready at ${this.root}`);
  }

  pathFor(sessionId: string): string {
    const validation = validateSessionId(sessionId);
    if (!validation.valid) {
      throw new InvalidArgumentError(validation.error ?? 'Invalid session ID');
    }
    return join(this.root, sessionId);
  }

  async provision(sessionId: string): Promise<string> {
    const workspacePath = this.pathFor(sessionId);

    try {
      // Non-recursive on purpose: an existing directory must fail with EEXIST
      await mkdir(workspacePath);
    } catch (error) {
      const code = errorCode(error);
      if (code === 'EEXIST') {
        throw new AlreadyExistsError(workspacePath);
      }
      if (code && EXHAUSTION_CODES.has(code)) {
        throw new ResourceExhaustedError(`Cannot create workspace ${workspacePath}: ${code}`);
      }
      throw error;
    }

    this.logger?.verbose(`Provisioned workspace ${workspacePath}`);
    return workspacePath;
  }

  /**
   * Removes a workspace, or moves it under the archive root when `retain` is
   * set. Succeeds silently when the directory is already gone.
   * @returns the archive path when the workspace was retained
   */
  async reclaim(workspacePath: string, retain = false): Promise<string | null> {
    const target = this.assertInsideRoot(workspacePath);

    if (!retain) {
      await rm(target, { recursive: true, force: true });
      this.logger?.verbose(`Removed workspace ${target}`);
      return null;
    }

    const archivePath = join(this.archiveRoot, `${basename(target)}-${new Date().toISOString().replace(/[:.]/g, '-')}`);
    try {
      await rename(target, archivePath);
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT') {
        this.logger?.verbose(`Workspace ${target} already removed, nothing to archive`);
        return null;
      }
      if (code !== 'EXDEV') {
        throw error;
      }
      // Archive root on another filesystem
      await cp(target, archivePath, { recursive: true });
      await rm(target, { recursive: true, force: true });
    }

    this.logger?.info(`Archived workspace ${target} to ${archivePath}`);
    return archivePath;
  }

  /** Names of the workspace directories currently on disk. */
  async list(): Promise<string[]> {
    const entries = await readdir(this.root, { withFileTypes: true });
    return entries
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name)
      .sort();
  }

  /**
   * Removes workspace directories that belong to no known session, such as
   * those left behind when a previous server process was killed.
   */
  async sweepOrphans(knownSessionIds: Iterable<string> = []): Promise<string[]> {
    const known = new Set(knownSessionIds);
    const removed: string[] = [];
    for (const name of await this.list()) {
      if (known.has(name)) continue;
      await rm(join(this.root, name), { recursive: true, force: true });
      removed.push(name);
    }
    if (removed.length > 0) {
      this.logger?.info(`Removed ${removed.length} orphaned workspace(s): ${removed.join(', ')}`);
    }
    return removed;
  }

  private assertInsideRoot(workspacePath: string): string {
    const target = resolve(workspacePath);
    const rel = relative(this.root, target);
    if (!rel || rel.startsWith('..') || isAbsolute(rel) || rel.includes(sep)) {
      throw new InvalidArgumentError(`Refusing to reclaim ${workspacePath}: not a workspace under ${this.root}`);
    }
    return target;
  }
}
