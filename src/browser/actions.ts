import crypto from 'crypto'
import type { Logger } from '../audit/log'
import type { AuditLogger } from '../audit/logger'
import { sleep } from '../util/time'
import type { PageDriver } from './driver'
import { lookupKey } from './keys'
import { resolve, ResolvedElement } from './resolver'
import type { CandidateList, PatternParams } from './selectors'
import { BrowserSession, SessionTerminatedError, SessionUnavailableError } from './session'

export type ClickMechanism = 'native' | 'programmatic'

export type ActionOutcome =
  | { kind: 'clicked'; status: string; index: number; mechanism: ClickMechanism; attempts: number }
  | { kind: 'typed'; status: string; index: number; cleared: boolean }
  | { kind: 'key_pressed'; status: string; key: string }
  | { kind: 'not_found'; status: string }
  | { kind: 'execution_failed'; status: string; error: string }

export interface ActionOptions {
  params?: PatternParams
  /** Poll for an interactable match this long when the first lookup misses. 0 = one snapshot. */
  timeoutMs?: number
  /** Extra click attempts after the first one fails both mechanisms. */
  retries?: number
  /** Fixed pause after a successful action, for flows documented to need one. */
  settleMs?: number
  scroll?: boolean
  purpose?: string
}

export interface ExecutorSettings {
  retries: number
  pollIntervalMs: number
  /** Upper bound for one native click before falling back to dispatch. */
  nativeClickTimeoutMs: number
  navigationTimeoutMs: number
}

export const DEFAULT_EXECUTOR_SETTINGS: ExecutorSettings = {
  retries: 2,
  pollIntervalMs: 250,
  nativeClickTimeoutMs: 2000,
  navigationTimeoutMs: 30_000,
}

/** One step of a fallback chain, as a value instead of control flow. */
type Step = { ok: true } | { ok: false; error: string }

async function step(fn: () => Promise<unknown>): Promise<Step> {
  try {
    await fn()
    return { ok: true }
  } catch (err) {
    if (err instanceof SessionUnavailableError || err instanceof SessionTerminatedError) throw err
    return { ok: false, error: err instanceof Error ? err.message : String(err) }
  }
}

function actionId(): string {
  return 'act_' + crypto.randomBytes(6).toString('hex')
}

/**
 * Performs clicks, typing and key presses against resolved elements.
 * Failures come back as ActionOutcome values; only a dead or terminated
 * session throws.
 */
export class ActionExecutor {
  private readonly settings: ExecutorSettings

  constructor(
    private readonly session: BrowserSession,
    private readonly log: Logger,
    private readonly audit?: AuditLogger,
    settings: Partial<ExecutorSettings> = {},
  ) {
    this.settings = { ...DEFAULT_EXECUTOR_SETTINGS, ...settings }
  }

  private get driver(): PageDriver {
    return this.session.driver
  }

  async click(list: CandidateList, opts: ActionOptions = {}): Promise<ActionOutcome> {
    const t0 = Date.now()
    const retries = Math.max(0, opts.retries ?? this.settings.retries)
    let target = await this.locate(list, opts)
    if (!target) return this.record('click', t0, null, { kind: 'not_found', status: 'not_found' }, opts)

    let lastError = 'element detached'
    for (let attempt = 1; attempt <= retries + 1; attempt++) {
      if (attempt > 1) {
        target = await resolve(this.driver, list, opts.params)
        if (!target) break
      }
      const el = target.element
      if (opts.scroll !== false) {
        const scrolled = await step(() => el.scrollIntoView())
        if (!scrolled.ok) this.log.debug({ error: scrolled.error }, 'scrollIntoView failed')
      }

      const native = await step(() => el.click(this.settings.nativeClickTimeoutMs))
      let mechanism: ClickMechanism | null = native.ok ? 'native' : null
      let dispatched: Step = { ok: true }
      if (!mechanism) {
        dispatched = await step(() => el.dispatchClick())
        if (dispatched.ok) mechanism = 'programmatic'
      }

      if (mechanism) {
        await this.settle(opts)
        return this.record('click', t0, target, {
          kind: 'clicked',
          status: `clicked:${mechanism}`,
          index: target.index,
          mechanism,
          attempts: attempt,
        }, opts)
      }
      lastError = [native, dispatched].map((s) => (s.ok ? '' : s.error)).filter(Boolean).join('; ')
      this.log.debug({ attempt, error: lastError }, 'click attempt failed')
    }

    return this.record('click', t0, target, {
      kind: 'execution_failed',
      status: `execution_failed:${lastError}`,
      error: lastError,
    }, opts)
  }

  async type(list: CandidateList, text: string, opts: ActionOptions = {}): Promise<ActionOutcome> {
    const t0 = Date.now()
    const target = await this.locate(list, opts)
    if (!target) return this.record('type', t0, null, { kind: 'not_found', status: 'not_found' }, opts)

    const el = target.element
    const cleared = await step(() => el.clear())
    if (!cleared.ok) this.log.debug({ error: cleared.error }, 'clear failed, typing anyway')
    const typed = await step(() => el.type(text))
    if (!typed.ok) {
      return this.record('type', t0, target, {
        kind: 'execution_failed',
        status: `execution_failed:${typed.error}`,
        error: typed.error,
      }, opts)
    }
    await this.settle(opts)
    return this.record('type', t0, target, { kind: 'typed', status: 'typed', index: target.index, cleared: cleared.ok }, opts)
  }

  /** Global key event; `name` goes through the fixed key table. */
  async press(name: string, opts: ActionOptions = {}): Promise<ActionOutcome> {
    const t0 = Date.now()
    const key = lookupKey(name)
    if (!key) {
      const error = `Unsupported key: ${name}`
      return this.record('press', t0, null, { kind: 'execution_failed', status: error, error }, opts)
    }
    const pressed = await step(() => this.driver.pressKey(key))
    if (!pressed.ok) {
      return this.record('press', t0, null, {
        kind: 'execution_failed',
        status: `execution_failed:${pressed.error}`,
        error: pressed.error,
      }, opts)
    }
    await this.settle(opts)
    return this.record('press', t0, null, { kind: 'key_pressed', status: `pressed:${name}`, key }, opts)
  }

  async navigate(url: string): Promise<Step> {
    const t0 = Date.now()
    const res = await step(() => this.driver.goto(url, this.settings.navigationTimeoutMs))
    this.audit?.write({
      type: 'action',
      action: 'navigate',
      url,
      result: { status: res.ok ? 'ok' : 'failed', duration_ms: Date.now() - t0 },
      error: res.ok ? null : res.error,
    })
    return res
  }

  async back(): Promise<Step> {
    const res = await step(() => this.driver.back())
    this.audit?.write({ type: 'action', action: 'back', url: this.driver.url(), error: res.ok ? null : res.error })
    return res
  }

  async scrollBy(dy: number): Promise<Step> {
    return step(() => this.driver.scrollBy(0, dy))
  }

  /** Type into whatever currently has focus. */
  async typeFocused(text: string): Promise<Step> {
    const res = await step(() => this.driver.typeText(text))
    this.audit?.write({ type: 'action', action: 'type_focused', url: this.driver.url(), params: { value: '[REDACTED]' }, error: res.ok ? null : res.error })
    return res
  }

  /**
   * First lookup is a plain snapshot. On a miss, and only when a timeout is
   * given, keep polling until a match is also interactable.
   */
  private async locate(list: CandidateList, opts: ActionOptions): Promise<ResolvedElement | null> {
    const first = await resolve(this.driver, list, opts.params)
    const timeoutMs = opts.timeoutMs ?? 0
    if (first || timeoutMs <= 0) return first

    const deadline = Date.now() + timeoutMs
    while (Date.now() < deadline) {
      await sleep(Math.min(this.settings.pollIntervalMs, Math.max(0, deadline - Date.now())))
      const found = await resolve(this.driver, list, opts.params)
      if (found && (await found.element.isInteractable())) return found
    }
    return null
  }

  private async settle(opts: ActionOptions): Promise<void> {
    if (opts.settleMs && opts.settleMs > 0) await sleep(opts.settleMs)
  }

  private record(
    action: string,
    t0: number,
    target: ResolvedElement | null,
    outcome: ActionOutcome,
    opts: ActionOptions,
  ): ActionOutcome {
    const duration_ms = Date.now() - t0
    this.log.debug({ action, outcome: outcome.kind, index: target?.index, duration_ms }, outcome.status)
    this.audit?.write({
      type: 'action',
      action,
      url: this.session.isOpen ? this.driver.url() : undefined,
      selector: target?.pattern,
      params: {
        action_id: actionId(),
        candidate_index: target?.index ?? null,
        purpose: opts.purpose,
        ...(action === 'type' ? { value: '[REDACTED]' } : {}),
      },
      result: { kind: outcome.kind, status: outcome.status, duration_ms },
    })
    return outcome
  }
}
