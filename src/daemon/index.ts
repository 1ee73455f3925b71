#!/usr/bin/env node
/**
 * Daemon entrypoint, spawned by `stepwarden start` or run as
 * `node dist/daemon/index.js`. Configuration comes from STEPWARDEN_* env.
 */

// checked before imports that may fail on older runtimes
const [nodeMajor] = process.versions.node.split('.').map(Number)
if (nodeMajor < 20) {
  process.stderr.write(`[stepwarden] Node.js ${process.versions.node} is not supported; Node 20 or newer is required.\n`)
  process.exit(1)
}

import fs from 'fs'
import { createLogger } from '../audit/log'
import { AuditLogger } from '../audit/logger'
import { BrowserManager } from '../browser/manager'
import { HumanGate, ManualResumeChannel } from '../gate/human-gate'
import { MemoryPaymentRecords } from '../records/payments'
import { StepwardenConfig, logsDir, pidFile, profilesDir, resolveConfig } from './config'
import { buildServer } from './server'
import { SessionHolder } from './session'

/** Claims the PID file, or exits when a live daemon already holds it. */
function claimPidFile(file: string): void {
  if (fs.existsSync(file)) {
    const owner = Number(fs.readFileSync(file, 'utf8').trim())
    let alive = false
    try {
      process.kill(owner, 0)
      alive = true
    } catch {
      alive = false // stale
    }
    if (alive) {
      console.error(`stepwarden daemon already running (PID ${owner}). Use 'stepwarden stop' first.`)
      process.exit(1)
    }
  }
  fs.writeFileSync(file, String(process.pid))
}

function wire(config: StepwardenConfig) {
  const log = createLogger(config.logLevel)
  const audit = new AuditLogger(logsDir(config))
  const manager = new BrowserManager(config, log.child({ component: 'browser' }))
  // no console: a gate waits out its poll budget unless POST /api/v1/gate/resume ends it
  const gate = new HumanGate(
    new ManualResumeChannel(),
    log.child({ component: 'gate' }),
    { pollIntervalMs: config.gatePollIntervalMs, pollAttempts: config.gatePollAttempts, render: () => {} },
    audit,
  )
  const holder = new SessionHolder(manager, gate, new MemoryPaymentRecords(config.maxPrice), config, log, audit)
  const server = buildServer(config, holder)
  server.browserManager = manager
  server.auditLogger = audit
  return { audit, holder, server }
}

async function main(): Promise<void> {
  const config = resolveConfig()
  fs.mkdirSync(profilesDir(config), { recursive: true })
  const pid = pidFile(config)
  claimPidFile(pid)

  const { audit, holder, server } = wire(config)

  let stopping = false
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return
    stopping = true
    server.log.info({ signal }, 'shutting down')
    await holder.close()
    await server.close()
    await audit.close()
    fs.rmSync(pid, { force: true })
    process.exit(0)
  }
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => void shutdown(signal))
  }

  try {
    await server.listen({ port: config.port, host: config.host })
  } catch (err) {
    server.log.error({ err }, 'listen failed')
    fs.rmSync(pid, { force: true })
    process.exit(1)
  }
}

main().catch((err: unknown) => {
  console.error('[stepwarden] fatal:', err)
  process.exit(1)
})
