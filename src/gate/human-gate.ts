import crypto from 'crypto'
import readline from 'readline'
import type { Logger } from '../audit/log'
import type { AuditLogger } from '../audit/logger'

export interface HumanGateRequest {
  id: string
  prompt: string
  createdAt: string
}

export type ChannelResult = 'resumed' | 'closed'

/** Source of the operator's "continue" signal. */
export interface ResumeChannel {
  /** Settles once per gate: the operator resumed, or the channel went away. */
  wait(): Promise<ChannelResult>
  /** Stop listening; the gate was released some other way. */
  cancel(): void
}

/** One line on stdin resumes; EOF or an unreadable stream reports closed. */
export class ConsoleResumeChannel implements ResumeChannel {
  private rl: readline.Interface | null = null

  constructor(private readonly input: NodeJS.ReadableStream = process.stdin) {}

  wait(): Promise<ChannelResult> {
    if (!this.input.readable) return Promise.resolve('closed')
    return new Promise((resolve) => {
      const rl = readline.createInterface({ input: this.input, terminal: false })
      this.rl = rl
      let settled = false
      const done = (result: ChannelResult) => {
        if (settled) return
        settled = true
        this.rl = null
        rl.close()
        resolve(result)
      }
      rl.once('line', () => done('resumed'))
      rl.once('close', () => done('closed'))
    })
  }

  cancel(): void {
    this.rl?.close()
  }
}

/**
 * No console at all. Reports closed straight away, so the gate runs its
 * bounded poll budget and HumanGate.resume() (the daemon's HTTP route) can
 * end it early.
 */
export class ManualResumeChannel implements ResumeChannel {
  async wait(): Promise<ChannelResult> {
    return 'closed'
  }

  cancel(): void {}
}

export interface HumanGateSettings {
  /** Fallback wait used once the resume channel is gone. */
  pollIntervalMs: number
  pollAttempts: number
  /** Where the prompt banner goes. */
  render?: (text: string) => void
}

type Wakeup = 'resumed' | 'tick'

/**
 * Blocking hand-off to a human operator. While a request is pending nothing
 * else moves forward; callers serialize on it (see ToolRegistry). If the
 * console is gone the gate waits a bounded number of poll intervals and then
 * gives control back, so a run never hangs on a dead input.
 */
export class HumanGate {
  private current: { request: HumanGateRequest; release: () => void } | null = null

  constructor(
    private readonly channel: ResumeChannel,
    private readonly log: Logger,
    private readonly settings: HumanGateSettings,
    private readonly audit?: AuditLogger,
  ) {}

  get pending(): HumanGateRequest | null {
    return this.current?.request ?? null
  }

  /** External resume signal. False when no gate is pending. */
  resume(): boolean {
    if (!this.current) return false
    this.current.release()
    return true
  }

  async request(prompt: string): Promise<'human_done'> {
    if (this.current) throw new Error(`Human gate already pending: ${this.current.request.id}`)

    let release: () => void = () => {}
    const released = new Promise<Wakeup>((r) => {
      release = () => r('resumed')
    })
    const request: HumanGateRequest = {
      id: 'gate_' + crypto.randomBytes(4).toString('hex'),
      prompt,
      createdAt: new Date().toISOString(),
    }
    this.current = { request, release }

    const render = this.settings.render ?? ((text: string) => process.stdout.write(text))
    render(`\n================ HUMAN GATE ================\n${prompt}\n============================================\n`)
    this.log.warn({ gate: request.id }, 'waiting for human operator')
    this.audit?.write({ type: 'gate', action: 'request', params: { gate_id: request.id, prompt } })

    let via: 'signal' | 'channel' | 'poll_timeout'
    try {
      const first = await Promise.race([
        released.then(() => 'signal' as const),
        this.channel.wait().then((r) => (r === 'resumed' ? ('channel' as const) : r)),
      ])
      via = first === 'closed' ? await this.pollFallback(request, released) : first
    } finally {
      this.channel.cancel()
      this.current = null
    }

    this.audit?.write({ type: 'gate', action: 'resume', params: { gate_id: request.id }, result: { via } })
    this.log.info({ gate: request.id, via }, 'human gate released')
    return 'human_done'
  }

  private async pollFallback(
    request: HumanGateRequest,
    released: Promise<Wakeup>,
  ): Promise<'signal' | 'poll_timeout'> {
    this.log.warn({ gate: request.id, attempts: this.settings.pollAttempts }, 'no resume channel, polling')
    this.audit?.write({
      type: 'gate',
      action: 'poll_fallback',
      params: { gate_id: request.id, interval_ms: this.settings.pollIntervalMs, attempts: this.settings.pollAttempts },
    })
    for (let attempt = 0; attempt < this.settings.pollAttempts; attempt++) {
      this.log.info({ gate: request.id, attempt: attempt + 1 }, 'waiting...')
      let timer: NodeJS.Timeout | undefined
      const tick = new Promise<Wakeup>((r) => {
        timer = setTimeout(() => r('tick'), this.settings.pollIntervalMs)
      })
      const woke = await Promise.race([released, tick])
      clearTimeout(timer)
      if (woke === 'resumed') return 'signal'
    }
    return 'poll_timeout'
  }
}
