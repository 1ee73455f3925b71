import type { AuditLogger } from '../audit/logger'
import type { Logger } from '../audit/log'
import type { SessionLauncher } from '../browser/manager'
import { TaskRuntime } from '../agent/runtime'
import { TASKS, TaskName } from '../agent/tasks'
import type { HumanGate } from '../gate/human-gate'
import type { PaymentRecords } from '../records/payments'
import type { StepwardenConfig } from './config'

export interface SessionInfo {
  task: TaskName
  headless: boolean
  createdAt: string
  state: 'open' | 'terminated' | 'closed'
  reason?: string
}

/** A session is already open; close it before opening another. */
export class SessionConflictError extends Error {
  constructor(readonly task: TaskName) {
    super(`A ${task} session is already open`)
    this.name = 'SessionConflictError'
  }
}

/**
 * The daemon owns at most one browser session and the task bound to it.
 * A terminated runtime stays addressable so later calls report it.
 */
export class SessionHolder {
  private runtime: TaskRuntime | null = null
  private meta: { headless: boolean; createdAt: string } | null = null

  constructor(
    private readonly launcher: SessionLauncher,
    readonly gate: HumanGate,
    private readonly records: PaymentRecords,
    private readonly config: StepwardenConfig,
    private readonly log: Logger,
    private readonly audit?: AuditLogger,
  ) {}

  get current(): TaskRuntime | null {
    return this.runtime
  }

  info(): SessionInfo | null {
    if (!this.runtime || !this.meta) return null
    const { session } = this.runtime.ctx
    return {
      task: this.runtime.task.name,
      headless: this.meta.headless,
      createdAt: this.meta.createdAt,
      state: session.state,
      reason: session.reason,
    }
  }

  async open(task: TaskName, headless = this.config.headless): Promise<TaskRuntime> {
    if (this.runtime?.ctx.session.isOpen) throw new SessionConflictError(this.runtime.task.name)
    const session = await this.launcher.launch({ profile: task, headless })
    this.runtime = new TaskRuntime(TASKS[task], {
      session,
      gate: this.gate,
      records: this.records,
      config: this.config,
      log: this.log,
      audit: this.audit,
    })
    this.meta = { headless, createdAt: new Date().toISOString() }
    return this.runtime
  }

  /** False when nothing was open. A pending human gate is released first. */
  async close(): Promise<boolean> {
    this.gate.resume()
    const closed = await this.launcher.close()
    this.runtime = null
    this.meta = null
    return closed
  }
}
