import { parseCurrency } from '../browser/normalize'
import { resolve } from '../browser/resolver'
import { PatternParams, candidates } from '../browser/selectors'
import { BrowserSession, SessionTerminatedError, SessionUnavailableError } from '../browser/session'
import type { CheckoutBoundary, SiteProfile } from '../sites/types'
import { sleep } from '../util/time'

export interface BalanceFact {
  /** Element text as displayed, trimmed. */
  text: string
  /** null when the text does not parse as an amount. */
  value: number | null
}

export type Checkpoint = 'captcha' | 'signin'

function includesAny(haystack: string, needles: string[]): boolean {
  return needles.some((n) => haystack.includes(n.toLowerCase()))
}

/**
 * True only when the path carries every checkout marker AND the flow
 * parameter has exactly the expected value. Either condition alone is not
 * enough.
 */
export function isIrreversibleCheckout(url: string, boundary?: CheckoutBoundary): boolean {
  if (!url || !boundary) return false
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    return false
  }
  const pathname = parsed.pathname.toLowerCase()
  if (!boundary.pathMarkers.every((m) => pathname.includes(m.toLowerCase()))) return false
  const flow = (parsed.searchParams.get(boundary.param) ?? '').toLowerCase()
  return flow === boundary.value.toLowerCase()
}

/**
 * Named facts about the current page. Nothing is cached: every call goes
 * back to the live URL and DOM.
 */
export class PageStateDetector {
  constructor(
    private readonly session: BrowserSession,
    private readonly site: SiteProfile,
    private readonly pollIntervalMs = 250,
  ) {}

  url(): string {
    return this.session.driver.url()
  }

  async present(concern: string, params?: PatternParams): Promise<boolean> {
    return (await resolve(this.session.driver, candidates(this.site.selectors, concern), params)) !== null
  }

  /** URL login marker OR username field OR password field. */
  async loginContext(): Promise<boolean> {
    if (includesAny(this.url().toLowerCase(), this.site.loginUrlMarkers)) return true
    if (await this.present('LOGIN_USERNAME')) return true
    return this.present('LOGIN_PASSWORD')
  }

  dashboard(): Promise<boolean> {
    return this.present('DASHBOARD_MARKER')
  }

  transferPage(): Promise<boolean> {
    return this.present('TRANSFER_MARKER')
  }

  async balance(): Promise<BalanceFact | null> {
    return this.amount('BALANCE_VALUE')
  }

  /** Text + parsed amount of the first element of a concern. */
  async amount(concern: string): Promise<BalanceFact | null> {
    const found = await resolve(this.session.driver, candidates(this.site.selectors, concern))
    if (!found) return null
    let text: string
    try {
      text = (await found.element.text()).trim()
    } catch (err) {
      if (err instanceof SessionUnavailableError || err instanceof SessionTerminatedError) throw err
      return null // detached between query and read
    }
    return { text, value: parseCurrency(text) }
  }

  checkoutDetected(url = this.url()): boolean {
    return isIrreversibleCheckout(url, this.site.checkout)
  }

  /** Captcha wins over sign-in; null when neither blocks the page. */
  async checkpoint(): Promise<Checkpoint | null> {
    const markers = this.site.checkpoint
    if (!markers) return null
    const url = this.url().toLowerCase()
    if (includesAny(url, markers.captchaUrlMarkers)) return 'captcha'
    if (includesAny(url, markers.signinUrlMarkers)) return 'signin'
    if ((await this.present('SIGNIN_EMAIL')) || (await this.present('SIGNIN_PASSWORD'))) return 'signin'
    return null
  }

  /** Poll until a concern resolves or the timeout passes. */
  async waitFor(concern: string, timeoutMs: number, params?: PatternParams): Promise<boolean> {
    const deadline = Date.now() + timeoutMs
    for (;;) {
      if (await this.present(concern, params)) return true
      const left = deadline - Date.now()
      if (left <= 0) return false
      await sleep(Math.min(this.pollIntervalMs, left))
    }
  }
}
