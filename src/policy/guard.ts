import type { Logger } from '../audit/log'
import type { AuditLogger } from '../audit/logger'
import type { BrowserSession } from '../browser/session'
import { isIrreversibleCheckout } from '../state/detector'
import { ALLOWED, BoundaryStatus, StopGuardConfig, StopGuardVerdict, blocked } from './types'

/**
 * Authoritative checks in front of irreversible steps. A verdict is never
 * softened by callers, and once the boundary trips it stays tripped.
 */
export class StopGuard {
  private _tripReason: string | null = null

  constructor(
    private readonly config: StopGuardConfig,
    private readonly log: Logger,
    private readonly audit?: AuditLogger,
  ) {}

  get tripped(): boolean {
    return this._tripReason !== null
  }

  get tripReason(): string | null {
    return this._tripReason
  }

  get maxPrice(): number | undefined {
    return this.config.maxPrice
  }

  /** Amount exactly at the ceiling passes; anything above is blocked. */
  checkPrice(amount: number | null, ceiling: number | undefined = this.config.maxPrice): StopGuardVerdict {
    let verdict: StopGuardVerdict = ALLOWED
    if (ceiling !== undefined) {
      if (amount === null || !Number.isFinite(amount)) verdict = blocked('price unknown')
      else if (amount > ceiling) verdict = blocked('exceeds limit')
    }
    if (!verdict.allowed) {
      this.log.warn({ amount, ceiling, reason: verdict.reason }, 'price guard blocked')
      this.audit?.write({
        type: 'guard',
        action: 'deny',
        params: { guard: 'price_ceiling', amount, ceiling },
        result: { verdict: 'blocked', reason: verdict.reason },
      })
    }
    return verdict
  }

  isCheckoutUrl(url: string): boolean {
    return isIrreversibleCheckout(url, this.config.checkout)
  }

  /**
   * Call after anything that may have navigated. On the irreversible
   * checkout page the whole session is terminated; there is no undo.
   */
  async enforceBoundary(session: BrowserSession): Promise<BoundaryStatus> {
    if (!session.isOpen) return 'clear'
    const url = session.driver.url()
    if (!this.isCheckoutUrl(url)) return 'clear'

    this._tripReason = `irreversible checkout reached: ${url}`
    this.log.warn({ url }, 'stop guard tripped, terminating browser session')
    this.audit?.write({
      type: 'guard',
      action: 'terminate',
      url,
      params: { guard: 'irreversible_page' },
      result: { verdict: 'stopped' },
    })
    await session.terminate(this._tripReason)
    return 'stopped'
  }
}
