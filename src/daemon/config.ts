import os from 'os'
import path from 'path'

export interface StepwardenConfig {
  port: number
  host: string
  dataDir: string
  logLevel: string
  apiToken?: string
  headless: boolean
  /** How long click/type poll for a missing element when a tool asks them to wait. */
  actionTimeoutMs: number
  /** Extra click attempts after native + programmatic both fail. */
  clickRetries: number
  pollIntervalMs: number
  /** Orchestration loop step budget. */
  maxSteps: number
  /** Price ceiling for the Stop Guard and the payment collaborator. */
  maxPrice: number
  /** Human gate fallback when the console channel is gone. */
  gatePollIntervalMs: number
  gatePollAttempts: number
}

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name]
  if (raw === undefined || raw.trim() === '') return fallback
  const n = Number(raw)
  return Number.isFinite(n) ? n : fallback
}

function envBool(name: string, fallback: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase()
  if (!raw) return fallback
  return !['0', 'false', 'no', 'off'].includes(raw)
}

export function resolveConfig(overrides: Partial<StepwardenConfig> = {}): StepwardenConfig {
  const dataDir =
    overrides.dataDir ??
    process.env.STEPWARDEN_DATA_DIR ??
    path.join(os.homedir(), '.stepwarden')

  return {
    port: overrides.port ?? envNumber('STEPWARDEN_PORT', 19420),
    host: overrides.host ?? process.env.STEPWARDEN_HOST ?? '127.0.0.1',
    dataDir,
    logLevel: overrides.logLevel ?? process.env.STEPWARDEN_LOG_LEVEL ?? 'info',
    apiToken: overrides.apiToken ?? process.env.STEPWARDEN_API_TOKEN,
    headless: overrides.headless ?? envBool('STEPWARDEN_HEADLESS', true),
    actionTimeoutMs: overrides.actionTimeoutMs ?? envNumber('STEPWARDEN_ACTION_TIMEOUT_MS', 8000),
    clickRetries: overrides.clickRetries ?? envNumber('STEPWARDEN_CLICK_RETRIES', 2),
    pollIntervalMs: overrides.pollIntervalMs ?? envNumber('STEPWARDEN_POLL_INTERVAL_MS', 250),
    maxSteps: overrides.maxSteps ?? envNumber('STEPWARDEN_MAX_STEPS', 30),
    maxPrice: overrides.maxPrice ?? envNumber('STEPWARDEN_MAX_PRICE', 200),
    gatePollIntervalMs: overrides.gatePollIntervalMs ?? envNumber('STEPWARDEN_GATE_POLL_INTERVAL_MS', 10_000),
    gatePollAttempts: overrides.gatePollAttempts ?? envNumber('STEPWARDEN_GATE_POLL_ATTEMPTS', 6),
  }
}

export function profilesDir(config: StepwardenConfig): string {
  return path.join(config.dataDir, 'profiles')
}

export function logsDir(config: StepwardenConfig): string {
  return path.join(config.dataDir, 'logs')
}

export function pidFile(config: StepwardenConfig): string {
  return path.join(config.dataDir, 'daemon.pid')
}
