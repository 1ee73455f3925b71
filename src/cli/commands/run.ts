import fs from 'fs'
import { ScriptedCall, ScriptedPlanner } from '../../agent/planner'
import { TaskRuntime } from '../../agent/runtime'
import { TASKS, TASK_NAMES, TaskInput, isTaskName } from '../../agent/tasks'
import { createLogger } from '../../audit/log'
import { AuditLogger } from '../../audit/logger'
import { BrowserManager } from '../../browser/manager'
import { logsDir, resolveConfig } from '../../daemon/config'
import { ConsoleResumeChannel, HumanGate } from '../../gate/human-gate'
import { MemoryPaymentRecords } from '../../records/payments'

export interface RunOptions extends TaskInput {
  headed?: boolean
  maxSteps?: number
  script?: string
  card?: string
  dataDir?: string
  logLevel?: string
}

/** Reads a JSON array of `{ tool, args? }` calls. */
export function loadScript(file: string): ScriptedCall[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'))
  if (!Array.isArray(parsed)) throw new Error(`${file}: expected a JSON array of calls`)
  return parsed.map((entry: unknown, i) => {
    if (typeof entry !== 'object' || entry === null || !('tool' in entry) || typeof entry.tool !== 'string') {
      throw new Error(`${file}[${i}]: each call needs a "tool" string`)
    }
    if (!('args' in entry) || entry.args === undefined) return { tool: entry.tool }
    const args = entry.args
    if (typeof args !== 'object' || args === null || Array.isArray(args)) {
      throw new Error(`${file}[${i}]: "args" must be an object`)
    }
    return { tool: entry.tool, args: { ...args } }
  })
}

export async function runTask(taskName: string, opts: RunOptions): Promise<void> {
  if (!isTaskName(taskName)) {
    throw new Error(`Unknown task '${taskName}'; expected one of ${TASK_NAMES.join(', ')}`)
  }
  const task = TASKS[taskName]
  const config = resolveConfig({
    ...(opts.dataDir ? { dataDir: opts.dataDir } : {}),
    ...(opts.logLevel ? { logLevel: opts.logLevel } : {}),
    ...(opts.headed ? { headless: false } : {}),
    ...(opts.maxSteps !== undefined ? { maxSteps: opts.maxSteps } : {}),
  })
  const log = createLogger(config.logLevel)
  const audit = new AuditLogger(logsDir(config))
  const calls = opts.script ? loadScript(opts.script) : task.script(opts)

  const records = new MemoryPaymentRecords(config.maxPrice)
  if (opts.card && opts.userId) records.store(opts.userId, opts.card)

  const gate = new HumanGate(
    new ConsoleResumeChannel(),
    log.child({ component: 'gate' }),
    { pollIntervalMs: config.gatePollIntervalMs, pollAttempts: config.gatePollAttempts },
    audit,
  )
  const manager = new BrowserManager(config, log.child({ component: 'browser' }))

  try {
    const session = await manager.launch({ profile: task.name })
    const runtime = new TaskRuntime(task, { session, gate, records, config, log, audit })
    const result = await runtime.run(new ScriptedPlanner(calls), config.maxSteps)

    for (const step of result.steps) {
      console.log(`  ${String(step.index + 1).padStart(2)}. ${step.tool} → ${step.result}`)
    }
    console.log(`${task.name}: ${result.outcome}${result.reason ? ` (${result.reason})` : ''}`)
    process.exitCode = result.outcome === 'succeeded' ? 0 : 1
  } finally {
    await manager.close()
    await audit.close()
  }
}
