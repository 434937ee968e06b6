import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { WorkspaceManager } from '../workspaceManager.js';
import {
  AlreadyExistsError,
  InvalidArgumentError,
  WorkspaceRootUnavailableError
} from '../../errors.js';
import { makeTempDir, removeDir } from '../../__tests__/helpers.js';

describe('WorkspaceManager', () => {
  let base: string;
  let manager: WorkspaceManager;

  beforeEach(async () => {
    base = await makeTempDir('workspace-test-');
    manager = new WorkspaceManager(join(base, 'workspaces'), join(base, 'archive'));
    await manager.initialize();
  });

  afterEach(async () => {
    await removeDir(base);
  });

  describe('initialize', () => {
    it('creates the workspace and archive roots', () => {
      expect(existsSync(join(base, 'workspaces'))).toBe(true);
      expect(existsSync(join(base, 'archive'))).toBe(true);
    });

    it('fails when the root cannot be a directory', async () => {
      const blocked = join(base, 'blocked');
      await writeFile(blocked, 'not a directory');

      await expect(new WorkspaceManager(blocked, join(base, 'other-archive')).initialize())
        .rejects.toBeInstanceOf(WorkspaceRootUnavailableError);
    });
  });

  describe('provision', () => {
    it('creates an empty directory named after the session', async () => {
      const path = await manager.provision('session-a');

      expect(path).toBe(join(base, 'workspaces', 'session-a'));
      expect(existsSync(path)).toBe(true);
      expect(await manager.list()).toEqual(['session-a']);
    });

    it('refuses to reuse an existing directory', async () => {
      await manager.provision('session-a');

      await expect(manager.provision('session-a')).rejects.toBeInstanceOf(AlreadyExistsError);
    });

    it.each(['', '../escape', 'nested/dir', '.'])('rejects the id %j', async (sessionId) => {
      await expect(manager.provision(sessionId)).rejects.toBeInstanceOf(InvalidArgumentError);
    });
  });

  describe('reclaim', () => {
    it('removes the workspace and everything in it', async () => {
      const path = await manager.provision('session-a');
      await mkdir(join(path, 'src'));
      await writeFile(join(path, 'src', 'main.ts'), 'export {};');

      expect(await manager.reclaim(path)).toBeNull();
      expect(existsSync(path)).toBe(false);
    });

    it('succeeds when the workspace is already gone', async () => {
      const path = await manager.provision('session-a');
      await manager.reclaim(path);

      await expect(manager.reclaim(path)).resolves.toBeNull();
      await expect(manager.reclaim(path, true)).resolves.toBeNull();
    });

    it('moves retained workspaces under the archive root', async () => {
      const path = await manager.provision('session-a');
      await writeFile(join(path, 'result.txt'), 'done');

      const archivePath = await manager.reclaim(path, true);

      expect(archivePath).not.toBeNull();
      expect(dirname(archivePath ?? '')).toBe(join(base, 'archive'));
      expect(archivePath?.startsWith(join(base, 'archive', 'session-a-'))).toBe(true);
      expect(await readFile(join(archivePath ?? '', 'result.txt'), 'utf-8')).toBe('done');
      expect(existsSync(path)).toBe(false);
    });

    it('refuses paths that are not workspaces under the root', async () => {
      const outside = join(base, 'precious');
      await mkdir(outside);

      await expect(manager.reclaim(outside)).rejects.toBeInstanceOf(InvalidArgumentError);
      await expect(manager.reclaim(join(base, 'workspaces'))).rejects.toBeInstanceOf(InvalidArgumentError);
      await expect(manager.reclaim(join(base, 'workspaces', 'a', 'b'))).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(existsSync(outside)).toBe(true);
    });
  });

  describe('sweepOrphans', () => {
    it('removes directories that belong to no known session', async () => {
      await manager.provision('live');
      await manager.provision('stale-1');
      await manager.provision('stale-2');

      const removed = await manager.sweepOrphans(['live']);

      expect(removed).toEqual(['stale-1', 'stale-2']);
      expect(await manager.list()).toEqual(['live']);
    });
  });
});
