import type {
  CancelAllResponse,
  CancelSessionResponse,
  CreateSessionResponse,
  OutputEvent,
  Session,
  SubmitOptions,
  TaskPayload
} from '../../../shared/types/session.js';
import type { SessionRegistry } from './sessionRegistry.js';

/**
 * Operations offered to the request layer. Holds no state of its own; every
 * call is delegated to the registry.
 */
export class Orchestrator {
  constructor(private registry: SessionRegistry) {}

  submit(task: TaskPayload, options: SubmitOptions = {}): CreateSessionResponse {
    return { sessionId: this.registry.admit(task, options) };
  }

  status(sessionId: string): Session {
    return this.registry.get(sessionId);
  }

  list(): Session[] {
    return this.registry.list();
  }

  stream(sessionId: string, fromSequence = 0, signal?: AbortSignal): AsyncIterable<OutputEvent> {
    return this.registry.stream(sessionId, fromSequence, signal);
  }

  async cancel(sessionId: string, gracePeriodMs?: number): Promise<CancelSessionResponse> {
    const session = await this.registry.cancel(sessionId, gracePeriodMs);
    return { sessionId: session.id, state: session.state };
  }

  async cancelAll(gracePeriodMs?: number): Promise<CancelAllResponse> {
    return { cancelled: await this.registry.cancelAll(gracePeriodMs) };
  }

  health(): { activeSessions: number; maxConcurrentSessions: number; acceptingSessions: boolean } {
    return {
      activeSessions: this.registry.activeCount(),
      maxConcurrentSessions: this.registry.getMaxConcurrentSessions(),
      acceptingSessions: this.registry.isAcceptingSessions()
    };
  }
}
