import pino from 'pino'
import { TaskRuntime } from '../../src/agent/runtime'
import type { TaskDefinition } from '../../src/agent/tasks'
import type { AuditLogger } from '../../src/audit/logger'
import { BrowserSession } from '../../src/browser/session'
import { StepwardenConfig, resolveConfig } from '../../src/daemon/config'
import { HumanGate, ManualResumeChannel, ResumeChannel } from '../../src/gate/human-gate'
import { MemoryPaymentRecords } from '../../src/records/payments'
import { DomDriver, Pages } from './dom-driver'

export const silentLog = pino({ level: 'silent' })

/** Fast timings so polling paths finish in milliseconds. */
export function testConfig(overrides: Partial<StepwardenConfig> = {}): StepwardenConfig {
  return resolveConfig({
    dataDir: '/tmp/stepwarden-test',
    actionTimeoutMs: 200,
    clickRetries: 2,
    pollIntervalMs: 10,
    maxSteps: 30,
    maxPrice: 200,
    gatePollIntervalMs: 20,
    gatePollAttempts: 3,
    ...overrides,
  })
}

export interface Harness {
  driver: DomDriver
  session: BrowserSession
  gate: HumanGate
  records: MemoryPaymentRecords
  runtime: TaskRuntime
  config: StepwardenConfig
}

export function harness(
  task: TaskDefinition,
  pages: Pages,
  start: string,
  opts: { config?: Partial<StepwardenConfig>; channel?: ResumeChannel; audit?: AuditLogger } = {},
): Harness {
  const config = testConfig(opts.config)
  const driver = new DomDriver(pages, start)
  const session = new BrowserSession(driver)
  const gate = new HumanGate(
    opts.channel ?? new ManualResumeChannel(),
    silentLog,
    { pollIntervalMs: config.gatePollIntervalMs, pollAttempts: config.gatePollAttempts, render: () => {} },
    opts.audit,
  )
  const records = new MemoryPaymentRecords(config.maxPrice)
  const runtime = new TaskRuntime(task, { session, gate, records, config, log: silentLog, audit: opts.audit })
  return { driver, session, gate, records, runtime, config }
}
