import type { PageDriver } from './driver'

export type SessionState = 'open' | 'terminated' | 'closed'

/** Raised on any use of a session after a guard trip or explicit close. */
export class SessionTerminatedError extends Error {
  readonly state: SessionState
  constructor(state: SessionState, reason?: string) {
    super(reason ? `Browser session ${state}: ${reason}` : `Browser session ${state}`)
    this.name = 'SessionTerminatedError'
    this.state = state
  }
}

/** The browser could not be started or stopped responding. Aborts the run. */
export class SessionUnavailableError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message)
    this.name = 'SessionUnavailableError'
  }
}

/**
 * The one live browser page. Every component receives it explicitly; there
 * is no ambient driver.
 */
export class BrowserSession {
  private _state: SessionState = 'open'
  private _reason?: string

  constructor(private readonly _driver: PageDriver) {}

  get state(): SessionState {
    return this._state
  }

  get isOpen(): boolean {
    return this._state === 'open'
  }

  get reason(): string | undefined {
    return this._reason
  }

  get driver(): PageDriver {
    if (this._state !== 'open') throw new SessionTerminatedError(this._state, this._reason)
    return this._driver
  }

  /** Hard stop at an irreversible boundary. There is no way back to open. */
  async terminate(reason: string): Promise<void> {
    if (this._state !== 'open') return
    this._state = 'terminated'
    this._reason = reason
    await this.shutdown()
  }

  /**
   * Returns false when the session was already closed or terminated, or the
   * browser had already gone away underneath it.
   */
  async close(): Promise<boolean> {
    if (this._state !== 'open') return false
    this._state = 'closed'
    return this.shutdown()
  }

  private async shutdown(): Promise<boolean> {
    try {
      await this._driver.close()
      return true
    } catch {
      // browser process already gone
      return false
    }
  }
}
