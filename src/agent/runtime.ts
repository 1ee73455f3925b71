import type { AuditLogger } from '../audit/logger'
import type { Logger } from '../audit/log'
import type { BrowserSession } from '../browser/session'
import type { StepwardenConfig } from '../daemon/config'
import type { HumanGate } from '../gate/human-gate'
import type { PaymentRecords } from '../records/payments'
import { ToolContext, createToolContext } from './context'
import { AgentStep, LoopResult, Planner, runLoop } from './loop'
import { ToolRegistry } from './registry'
import type { TaskDefinition } from './tasks'

export interface RuntimeDeps {
  session: BrowserSession
  gate: HumanGate
  records: PaymentRecords
  config: StepwardenConfig
  log: Logger
  audit?: AuditLogger
}

/** One task bound to one live session. */
export class TaskRuntime {
  readonly ctx: ToolContext
  readonly registry: ToolRegistry

  constructor(
    readonly task: TaskDefinition,
    deps: RuntimeDeps,
  ) {
    this.ctx = createToolContext({ ...deps, site: task.site, log: deps.log.child({ task: task.name }) })
    this.registry = new ToolRegistry(this.ctx, task.tools, deps.audit)
  }

  run(planner: Planner, maxSteps = this.ctx.config.maxSteps): Promise<LoopResult> {
    return runLoop({
      planner,
      registry: this.registry,
      maxSteps,
      isSuccess: (h: readonly AgentStep[]) => this.task.isSuccess(h),
      log: this.ctx.log,
      audit: this.ctx.audit,
    })
  }
}
