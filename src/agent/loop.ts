import type { AuditLogger } from '../audit/logger'
import type { Logger } from '../audit/log'
import type { ToolRegistry } from './registry'

/** One planner-issued call and the status string it produced. */
export interface AgentStep {
  index: number
  tool: string
  args: Record<string, unknown>
  result: string
}

export type PlannerDecision =
  | { kind: 'call'; tool: string; args?: Record<string, unknown> }
  | { kind: 'finish'; answer?: string }

/** Opaque caller: reads the history, names the next tool. */
export interface Planner {
  next(history: readonly AgentStep[]): Promise<PlannerDecision>
}

export type LoopOutcome = 'succeeded' | 'stopped' | 'budget_exhausted' | 'planner_finished'

export interface LoopResult {
  outcome: LoopOutcome
  steps: AgentStep[]
  answer?: string
  reason?: string
}

export interface LoopOptions {
  planner: Planner
  registry: ToolRegistry
  maxSteps: number
  isSuccess(history: readonly AgentStep[]): boolean
  log: Logger
  audit?: AuditLogger
}

/**
 * Bounded plan → call → observe loop. Never runs more than `maxSteps`
 * calls and never retries on its own. A guard trip ends the run; a dead
 * browser or a call on a closed session throws out of it.
 */
export async function runLoop(opts: LoopOptions): Promise<LoopResult> {
  const { planner, registry, maxSteps, log, audit } = opts
  const steps: AgentStep[] = []

  const finish = (result: LoopResult): LoopResult => {
    log.info({ outcome: result.outcome, steps: result.steps.length, reason: result.reason }, 'loop finished')
    audit?.write({
      type: 'loop',
      action: 'terminate',
      result: { outcome: result.outcome, steps: result.steps.length, reason: result.reason ?? null },
    })
    return result
  }

  while (steps.length < maxSteps) {
    const decision = await planner.next(steps)
    if (decision.kind === 'finish') {
      return finish({ outcome: 'planner_finished', steps, answer: decision.answer })
    }

    const args = decision.args ?? {}
    const result = await registry.invoke(decision.tool, args)
    steps.push({ index: steps.length, tool: decision.tool, args, result })
    log.debug({ step: steps.length, tool: decision.tool, result }, 'step')

    if (opts.isSuccess(steps)) return finish({ outcome: 'succeeded', steps })
    if (registry.ctx.guard.tripped) {
      return finish({ outcome: 'stopped', steps, reason: registry.ctx.guard.tripReason ?? undefined })
    }
  }
  return finish({ outcome: 'budget_exhausted', steps })
}
