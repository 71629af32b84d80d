/**
 * Session scope: the single place an engine session is created and
 * cleaned up for a run.
 */

import { ResultCode } from '../engine/result.js';
import type { CreateSessionResult, EngineSession, ProgressCallback, ProtocolEngine } from '../engine/types.js';
import type { LogLevel } from '../types.js';

/**
 * Owns the single engine session of a run and releases it exactly once.
 * `release()` is safe before `open()`, after a failed `open()`, and when
 * called repeatedly.
 */
export class SessionScope {
  private session: EngineSession | null = null;
  private released = false;

  constructor(private readonly engine: ProtocolEngine) {}

  async open(progress: ProgressCallback, level: LogLevel): Promise<CreateSessionResult> {
    if (this.released) throw new Error('Session scope already released');
    if (this.session) throw new Error('Session already open');
    const result = await this.engine.createSession(progress, level);
    if (result.ok) this.session = result.session;
    return result;
  }

  get current(): EngineSession | null {
    return this.session;
  }

  get isReleased(): boolean {
    return this.released;
  }

  async release(): Promise<ResultCode> {
    if (this.released) return ResultCode.SUCCESS;
    this.released = true;

    const session = this.session;
    this.session = null;
    if (!session) return ResultCode.SUCCESS;
    return this.engine.cleanup(session);
  }
}
