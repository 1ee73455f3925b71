import fs from 'fs'
import os from 'os'
import path from 'path'
import type { FastifyInstance } from 'fastify'
import { afterEach, describe, expect, it } from 'vitest'
import { AuditLogger } from '../../src/audit/logger'
import type { SessionLauncher } from '../../src/browser/manager'
import { BrowserSession } from '../../src/browser/session'
import type { StepwardenConfig } from '../../src/daemon/config'
import { buildServer } from '../../src/daemon/server'
import { SessionHolder } from '../../src/daemon/session'
import { HumanGate, ManualResumeChannel } from '../../src/gate/human-gate'
import { MemoryPaymentRecords } from '../../src/records/payments'
import { DomDriver, Pages } from '../helpers/dom-driver'
import { silentLog, testConfig } from '../helpers/context'

const BANK = 'http://bank.test/'

/** Hands out jsdom-backed sessions instead of launching Chromium. */
class FakeLauncher implements SessionLauncher {
  session: BrowserSession | null = null

  constructor(private readonly pages: Pages, private readonly start: string) {}

  async launch(): Promise<BrowserSession> {
    this.session = new BrowserSession(new DomDriver(this.pages, this.start))
    return this.session
  }

  async close(): Promise<boolean> {
    const session = this.session
    this.session = null
    return session ? session.close() : false
  }
}

let server: FastifyInstance | null = null

function build(overrides: Partial<StepwardenConfig> = {}): FastifyInstance {
  const config = testConfig({ logLevel: 'silent', ...overrides })
  const gate = new HumanGate(new ManualResumeChannel(), silentLog, {
    pollIntervalMs: config.gatePollIntervalMs,
    pollAttempts: config.gatePollAttempts,
    render: () => {},
  })
  const holder = new SessionHolder(
    new FakeLauncher({ [BANK]: '<h1>Bank</h1>' }, BANK),
    gate,
    new MemoryPaymentRecords(config.maxPrice),
    config,
    silentLog,
  )
  server = buildServer(config, holder)
  return server
}

function tick(ms = 0): Promise<void> {
  return new Promise((r) => setTimeout(r, ms))
}

async function pendingGate(app: FastifyInstance): Promise<unknown> {
  let pending: unknown = null
  for (let i = 0; i < 50 && !pending; i++) {
    await tick(10)
    pending = (await app.inject({ method: 'GET', url: '/api/v1/gate' })).json().pending
  }
  return pending
}

afterEach(async () => {
  await server?.close()
  server = null
})

describe('daemon routes', () => {
  it('reports health without a session', async () => {
    const res = await build().inject({ method: 'GET', url: '/health' })
    expect(res.statusCode).toBe(200)
    expect(res.json()).toMatchObject({ status: 'ok', version: '0.1.0', session_open: false })
  })

  it('rejects an unknown task', async () => {
    const res = await build().inject({ method: 'POST', url: '/api/v1/session', payload: { task: 'nope' } })
    expect(res.statusCode).toBe(400)
    expect(res.json()).toEqual({ error: 'preflight_failed', field: 'task', constraint: 'one of banking, shopping, hotel' })
  })

  it('opens one session at a time', async () => {
    const app = build()
    const opened = await app.inject({ method: 'POST', url: '/api/v1/session', payload: { task: 'banking', headless: false } })
    expect(opened.statusCode).toBe(201)
    expect(opened.json()).toMatchObject({ task: 'banking', headless: false, state: 'open' })

    const again = await app.inject({ method: 'POST', url: '/api/v1/session', payload: { task: 'shopping' } })
    expect(again.statusCode).toBe(409)
    expect(again.json()).toMatchObject({ error: 'session_exists', task: 'banking' })
  })

  it('lists and calls the task tools', async () => {
    const app = build()
    await app.inject({ method: 'POST', url: '/api/v1/session', payload: { task: 'banking' } })

    const list = await app.inject({ method: 'GET', url: '/api/v1/tools' })
    const names: unknown[] = list.json().tools.map((t: { name: string }) => t.name)
    expect(names).toContain('bank_get_balance')

    const call = await app.inject({ method: 'POST', url: '/api/v1/tools/current_url', payload: {} })
    expect(call.json()).toEqual({ tool: 'current_url', result: `URL: ${BANK}` })

    const unknown = await app.inject({ method: 'POST', url: '/api/v1/tools/nope', payload: { args: {} } })
    expect(unknown.json()).toEqual({ tool: 'nope', result: 'unknown_tool:nope' })

    const bad = await app.inject({ method: 'POST', url: '/api/v1/tools/go_to', payload: { args: { url: 1 } } })
    expect(bad.json()).toEqual({ tool: 'go_to', result: 'invalid_args:url must be a string' })
  })

  it('answers 404 for tools without a session', async () => {
    const res = await build().inject({ method: 'GET', url: '/api/v1/tools' })
    expect(res.statusCode).toBe(404)
  })

  it('holds a human gate until resumed over HTTP', async () => {
    const app = build({ gatePollIntervalMs: 1000 })
    await app.inject({ method: 'POST', url: '/api/v1/session', payload: { task: 'banking' } })

    expect((await app.inject({ method: 'POST', url: '/api/v1/gate/resume' })).statusCode).toBe(409)

    const gated = app.inject({ method: 'POST', url: '/api/v1/tools/human_gate', payload: { args: { message: 'solve it' } } }).then((r) => r.json())
    expect(await pendingGate(app)).toMatchObject({ prompt: 'solve it' })

    const resumed = await app.inject({ method: 'POST', url: '/api/v1/gate/resume' })
    expect(resumed.json()).toMatchObject({ status: 'resumed' })
    expect(await gated).toEqual({ tool: 'human_gate', result: 'human_done' })
  })

  it('releases a pending gate when the session is closed', async () => {
    const app = build({ gatePollIntervalMs: 1000 })
    await app.inject({ method: 'POST', url: '/api/v1/session', payload: { task: 'banking' } })
    const gated = app.inject({ method: 'POST', url: '/api/v1/tools/human_gate', payload: {} }).then((r) => r.json())
    expect(await pendingGate(app)).not.toBeNull()

    expect((await app.inject({ method: 'DELETE', url: '/api/v1/session' })).json()).toEqual({ status: 'closed' })
    expect(await gated).toEqual({ tool: 'human_gate', result: 'human_done' })
    expect((await app.inject({ method: 'GET', url: '/api/v1/gate' })).json().pending).toBeNull()

    await app.inject({ method: 'POST', url: '/api/v1/session', payload: { task: 'banking' } })
    const again = app.inject({ method: 'POST', url: '/api/v1/tools/human_gate', payload: {} }).then((r) => r.json())
    expect(await pendingGate(app)).not.toBeNull()
    expect((await app.inject({ method: 'POST', url: '/api/v1/gate/resume' })).json()).toMatchObject({ status: 'resumed' })
    expect(await again).toEqual({ tool: 'human_gate', result: 'human_done' })
  })

  it('reports calls on a finished session as 409', async () => {
    const app = build()
    await app.inject({ method: 'POST', url: '/api/v1/session', payload: { task: 'banking' } })
    const finished = await app.inject({ method: 'POST', url: '/api/v1/tools/finish_session', payload: {} })
    expect(finished.json()).toEqual({ tool: 'finish_session', result: 'Browser closed.' })

    const after = await app.inject({ method: 'POST', url: '/api/v1/tools/current_url', payload: {} })
    expect(after.statusCode).toBe(409)
    expect(after.json()).toMatchObject({ error: 'session_terminated', state: 'closed' })

    const info = await app.inject({ method: 'GET', url: '/api/v1/session' })
    expect(info.json()).toMatchObject({ task: 'banking', state: 'closed' })
  })

  it('closes the session', async () => {
    const app = build()
    await app.inject({ method: 'POST', url: '/api/v1/session', payload: { task: 'banking' } })
    expect((await app.inject({ method: 'DELETE', url: '/api/v1/session' })).json()).toEqual({ status: 'closed' })
    expect((await app.inject({ method: 'DELETE', url: '/api/v1/session' })).json()).toEqual({ status: 'already_closed' })
    expect((await app.inject({ method: 'GET', url: '/api/v1/session' })).statusCode).toBe(404)
  })

  it('requires the API token when one is configured', async () => {
    const app = build({ apiToken: 'test-secret' })
    expect((await app.inject({ method: 'GET', url: '/health' })).statusCode).toBe(200)
    expect((await app.inject({ method: 'GET', url: '/api/v1/status' })).statusCode).toBe(401)

    const ok = await app.inject({ method: 'GET', url: '/api/v1/status', headers: { 'x-api-token': 'test-secret' } })
    expect(ok.statusCode).toBe(200)
    expect(ok.json()).toMatchObject({ session: null, gate_pending: null, guard_tripped: null })

    const bearer = await app.inject({ method: 'GET', url: '/api/v1/status', headers: { authorization: 'Bearer test-secret' } })
    expect(bearer.statusCode).toBe(200)
  })

  it('serves the audit trail', async () => {
    const app = build()
    expect((await app.inject({ method: 'GET', url: '/api/v1/trace' })).statusCode).toBe(503)

    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stepwarden-trace-'))
    const audit = new AuditLogger(dir)
    audit.write({ type: 'loop', action: 'terminate' })
    await audit.close()
    app.auditLogger = audit

    const bad = await app.inject({ method: 'GET', url: '/api/v1/trace?type=bogus' })
    expect(bad.statusCode).toBe(400)
    const trace = await app.inject({ method: 'GET', url: '/api/v1/trace?type=loop' })
    expect(trace.json().entries).toHaveLength(1)
    fs.rmSync(dir, { recursive: true, force: true })
  })
})
