import { DEFAULT_GATE_MESSAGE } from './tools/common'
import type { AgentStep, Planner, PlannerDecision } from './loop'

export interface ScriptedCall {
  tool: string
  args?: Record<string, unknown>
}

/** Results that mean "a person has to do something first". */
const NEEDS_HUMAN = /^(ADD_FAILED_NEEDS_HUMAN|HUMAN_NEEDED_[A-Z]+|blocked:(captcha|signin))$/

/**
 * Replays a fixed list of calls. When a call reports that a human is
 * needed, it asks for the human gate and then repeats that call once.
 */
export class ScriptedPlanner implements Planner {
  private cursor = 0
  private retry: ScriptedCall | null = null
  private readonly escalated = new Set<number>()

  constructor(private readonly script: readonly ScriptedCall[]) {}

  async next(history: readonly AgentStep[]): Promise<PlannerDecision> {
    const last = history.length > 0 ? history[history.length - 1] : undefined
    if (last && NEEDS_HUMAN.test(last.result) && !this.escalated.has(last.index)) {
      this.escalated.add(last.index)
      this.retry = { tool: last.tool, args: last.args }
      return {
        kind: 'call',
        tool: 'human_gate',
        args: { message: `${last.tool} returned ${last.result}. ${DEFAULT_GATE_MESSAGE}` },
      }
    }
    if (this.retry) {
      const call = this.retry
      this.retry = null
      return { kind: 'call', ...call }
    }
    const call = this.script[this.cursor]
    if (!call) return { kind: 'finish', answer: 'script complete' }
    this.cursor++
    return { kind: 'call', ...call }
  }
}
