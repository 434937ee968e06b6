import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { join } from 'path';
import { ShutdownCoordinator } from '../shutdownCoordinator.js';
import { SessionRegistry } from '../sessionRegistry.js';
import { ProcessSupervisor } from '../processSupervisor.js';
import { WorkspaceManager } from '../workspaceManager.js';
import type { AgentExecutable } from '../agentExecutable.js';
import { OverloadedError } from '../../errors.js';
import { isProcessAlive } from '../../utils/processUtils.js';
import {
  STUBBORN_SCRIPT,
  collect,
  joinPayloads,
  makeTempDir,
  quietLogger,
  removeDir,
  shellAgent,
  waitFor,
  waitForOutput
} from '../../__tests__/helpers.js';

describe('ShutdownCoordinator', () => {
  let base: string;
  let workspaces: WorkspaceManager;
  let registry: SessionRegistry;

  beforeEach(async () => {
    base = await makeTempDir('shutdown-test-');
    workspaces = new WorkspaceManager(join(base, 'ws'), join(base, 'archive'), quietLogger);
    await workspaces.initialize();
  });

  afterEach(async () => {
    await registry.settled();
    registry.dispose();
    await removeDir(base);
  });

  function setup(executable: AgentExecutable, gracePeriodMs: number, killMarginMs = 1500): ShutdownCoordinator {
    registry = new SessionRegistry({
      workspaces,
      runner: new ProcessSupervisor(executable, {
        watchdogMs: 60000,
        defaultGracePeriodMs: 1000,
        drainTimeoutMs: 500,
        logger: quietLogger
      }),
      maxConcurrentSessions: 4,
      defaultGracePeriodMs: 1000,
      maxGracePeriodMs: 30000,
      retentionMs: 60000,
      logger: quietLogger
    });
    return new ShutdownCoordinator(registry, { gracePeriodMs, killMarginMs, logger: quietLogger });
  }

  // The scripts print "ready" once their signal handling is in place
  async function admitRunning(): Promise<string> {
    const id = registry.admit('task');
    await waitForOutput(registry.stream(id), 'ready');
    await waitFor(() => registry.get(id).state === 'running');
    return id;
  }

  it('reports a clean exit when nothing is running', async () => {
    const coordinator = setup(shellAgent('exit 0'), 1000);

    const report = await coordinator.shutdown();

    expect(report).toMatchObject({ exitCode: 0, forcedKills: [], remaining: [] });
  });

  it('lets a cooperative agent finish within the grace period', async () => {
    const script = "trap 'echo cleanup; exit 0' TERM; echo ready; sleep 30 & wait";
    const coordinator = setup(shellAgent(script), 3000);
    const id = await admitRunning();

    const report = await coordinator.shutdown('test');

    expect(report).toMatchObject({ exitCode: 0, forcedKills: [], remaining: [] });
    expect(report.durationMs).toBeLessThan(3000);
    expect(registry.get(id)).toMatchObject({ state: 'retired', outcome: 'cancelled', workspacePath: null });
    expect(joinPayloads(await collect(registry.stream(id)), 'stdout')).toBe('ready\ncleanup\n');
    expect(await workspaces.list()).toEqual([]);
    expect(() => registry.admit('late')).toThrow(OverloadedError);
  });

  it('force-kills an agent that ignores the interrupt and exits non-zero', async () => {
    const coordinator = setup(shellAgent(STUBBORN_SCRIPT), 300);
    const id = await admitRunning();
    const pid = registry.get(id).pid ?? 0;

    const report = await coordinator.shutdown('test');

    expect(report.exitCode).toBe(1);
    expect(report.forcedKills).toEqual([id]);
    expect(report.remaining).toEqual([]);
    expect(report.durationMs).toBeGreaterThanOrEqual(290);
    expect(registry.get(id)).toMatchObject({ state: 'retired', outcome: 'cancelled', signal: 'SIGKILL' });
    expect(isProcessAlive(pid)).toBe(false);
    expect(await workspaces.list()).toEqual([]);
  });

  it('kills an agent whose earlier cancellation has a longer grace period', async () => {
    const coordinator = setup(shellAgent(STUBBORN_SCRIPT), 300, 1000);
    const id = await admitRunning();
    const pid = registry.get(id).pid ?? 0;
    await registry.cancel(id, 20000);

    const report = await coordinator.shutdown('test');

    expect(report).toMatchObject({ exitCode: 1, forcedKills: [id], remaining: [] });
    expect(report.durationMs).toBeLessThan(5000);
    expect(isProcessAlive(pid)).toBe(false);
    expect(registry.get(id)).toMatchObject({ state: 'retired', outcome: 'cancelled', signal: 'SIGKILL' });
    expect(await workspaces.list()).toEqual([]);
  });

  it('returns the same report when called again', async () => {
    const coordinator = setup(shellAgent('exit 0'), 500);

    const first = coordinator.shutdown('first');
    const second = coordinator.shutdown('second');

    expect(second).toBe(first);
    expect(coordinator.isShuttingDown).toBe(true);
    await first;
  });
});
