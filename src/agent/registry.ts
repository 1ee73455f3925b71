import type { AuditLogger } from '../audit/logger'
import { SessionTerminatedError, SessionUnavailableError } from '../browser/session'
import type { ToolContext } from './context'

export type ToolParamType = 'string' | 'integer' | 'number' | 'boolean'
export type ToolArgValue = string | number | boolean
export type ToolArgs = Readonly<Record<string, ToolArgValue | undefined>>

export interface ToolParam {
  name: string
  type: ToolParamType
  description: string
  /** Filled in when the caller leaves the argument out. */
  default?: ToolArgValue
  optional?: boolean
  min?: number
  max?: number
  maxLength?: number
}

export interface ToolDefinition {
  name: string
  description: string
  params: ToolParam[]
  /** Still callable once the session is closed or terminated. */
  afterClose?: boolean
  run(ctx: ToolContext, args: ToolArgs): Promise<string>
}

export interface ToolDescription {
  name: string
  description: string
  params: ToolParam[]
}

export const STOPPED_ON_CHECKOUT = 'STOPPED_ON_CHECKOUT_SPC'

// ---------------------------------------------------------------------------
// Preflight argument validation
// ---------------------------------------------------------------------------

type Violation = { field: string; constraint: string }

function checkParam(p: ToolParam, value: unknown): Violation | null {
  const field = p.name
  switch (p.type) {
    case 'string':
      if (typeof value !== 'string') return { field, constraint: 'must be a string' }
      if (p.maxLength !== undefined && value.length > p.maxLength) {
        return { field, constraint: `max length ${p.maxLength} chars` }
      }
      return null
    case 'boolean':
      return typeof value === 'boolean' ? null : { field, constraint: 'must be a boolean' }
    case 'integer':
    case 'number':
      if (typeof value !== 'number' || !Number.isFinite(value)) return { field, constraint: 'must be a number' }
      if (p.type === 'integer' && !Number.isInteger(value)) return { field, constraint: 'must be an integer' }
      if (p.min !== undefined && value < p.min) return { field, constraint: `must be >= ${p.min}` }
      if (p.max !== undefined && value > p.max) return { field, constraint: `must be <= ${p.max}` }
      return null
  }
}

export type ParsedArgs = { ok: true; args: ToolArgs } | ({ ok: false } & Violation)

/** Checks every declared param and rejects undeclared ones. null counts as absent. */
export function parseArgs(params: ToolParam[], raw: Record<string, unknown>): ParsedArgs {
  const known = new Set(params.map((p) => p.name))
  const extra = Object.keys(raw).find((k) => !known.has(k))
  if (extra !== undefined) return { ok: false, field: extra, constraint: 'is not a parameter' }

  const args: Record<string, ToolArgValue | undefined> = {}
  for (const p of params) {
    const value = raw[p.name]
    if (value === undefined || value === null) {
      if (p.default !== undefined) args[p.name] = p.default
      else if (!p.optional) return { ok: false, field: p.name, constraint: 'is required' }
      continue
    }
    const violation = checkParam(p, value)
    if (violation) return { ok: false, ...violation }
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      args[p.name] = value
    }
  }
  return { ok: true, args }
}

export function argString(args: ToolArgs, name: string): string {
  const v = args[name]
  return typeof v === 'string' ? v : ''
}

export function argNumber(args: ToolArgs, name: string): number | undefined {
  const v = args[name]
  return typeof v === 'number' ? v : undefined
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/**
 * Named tools over one session. Calls run strictly one after another: while
 * a human gate is pending every later call waits behind it.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>()
  private queue: Promise<unknown> = Promise.resolve()

  constructor(
    readonly ctx: ToolContext,
    tools: ToolDefinition[],
    private readonly audit?: AuditLogger,
  ) {
    for (const t of tools) {
      if (this.tools.has(t.name)) throw new Error(`Duplicate tool name: ${t.name}`)
      this.tools.set(t.name, t)
    }
  }

  has(name: string): boolean {
    return this.tools.has(name)
  }

  list(): ToolDefinition[] {
    return [...this.tools.values()]
  }

  describe(): ToolDescription[] {
    return this.list().map(({ name, description, params }) => ({ name, description, params }))
  }

  invoke(name: string, raw: Record<string, unknown> = {}): Promise<string> {
    const run = this.queue.then(() => this.execute(name, raw))
    // the caller gets the failure through `run`; the queue only needs ordering
    this.queue = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }

  private async execute(name: string, raw: Record<string, unknown>): Promise<string> {
    const t0 = Date.now()
    const tool = this.tools.get(name)
    if (!tool) return this.record(name, raw, `unknown_tool:${name}`, t0)

    const parsed = parseArgs(tool.params, raw)
    if (!parsed.ok) return this.record(name, raw, `invalid_args:${parsed.field} ${parsed.constraint}`, t0)

    const { session, guard } = this.ctx
    if (!session.isOpen && !tool.afterClose) {
      const err = new SessionTerminatedError(session.state, session.reason)
      this.record(name, parsed.args, null, t0, err.message)
      throw err
    }

    let result: string
    try {
      result = await tool.run(this.ctx, parsed.args)
      // after every call: clicks and key presses can land on checkout too
      if ((await guard.enforceBoundary(session)) === 'stopped') {
        result = STOPPED_ON_CHECKOUT
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      this.record(name, parsed.args, null, t0, message)
      if (!(err instanceof SessionTerminatedError) && !(err instanceof SessionUnavailableError)) {
        this.ctx.log.error({ tool: name, err }, 'tool raised')
      }
      throw err
    }
    return this.record(name, parsed.args, result, t0)
  }

  private record(
    tool: string,
    args: Record<string, unknown>,
    result: string | null,
    t0: number,
    error?: string,
  ): string {
    const duration_ms = Date.now() - t0
    this.ctx.log.info({ tool, result, duration_ms }, error ? `tool failed: ${error}` : 'tool call')
    this.audit?.write({
      type: 'tool',
      action: tool,
      params: redact(args),
      result: { status: result, duration_ms },
      error: error ?? null,
    })
    return result ?? ''
  }
}

const SECRET_PARAMS = new Set(['password', 'text'])

function redact(args: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(args)) out[k] = SECRET_PARAMS.has(k) ? '[REDACTED]' : v
  return out
}
