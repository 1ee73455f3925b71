import fs from 'fs'
import path from 'path'

export type AuditType = 'action' | 'tool' | 'guard' | 'gate' | 'loop'

export const AUDIT_TYPES: readonly AuditType[] = ['action', 'tool', 'guard', 'gate', 'loop']

export interface AuditEntry {
  ts?: string
  v?: number
  type: AuditType
  action?: string
  url?: string
  selector?: string
  params?: Record<string, unknown>
  result?: Record<string, unknown>
  error?: string | null
}

function utcDay(at: Date): string {
  return at.toISOString().slice(0, 10)
}

function isAuditEntry(value: unknown): value is AuditEntry {
  if (typeof value !== 'object' || value === null || !('type' in value)) return false
  const { type } = value
  return AUDIT_TYPES.some((t) => t === type)
}

/**
 * Append-only JSONL trail under `<dataDir>/logs`, one `YYYY-MM-DD.jsonl`
 * file per UTC day. Secrets are redacted by the writers before they get here.
 */
export class AuditLogger {
  private day = ''
  private stream: fs.WriteStream | null = null

  constructor(private readonly dir: string) {
    fs.mkdirSync(dir, { recursive: true })
  }

  fileFor(day: string): string {
    return path.join(this.dir, `${day}.jsonl`)
  }

  write(entry: AuditEntry): void {
    const now = new Date()
    this.streamFor(utcDay(now)).write(JSON.stringify({ ts: now.toISOString(), v: 1, ...entry }) + '\n')
  }

  /** Last `lines` entries of today's file, optionally of one type. Unreadable lines are skipped. */
  tail(lines: number, type?: AuditType): AuditEntry[] {
    const file = this.fileFor(utcDay(new Date()))
    if (!fs.existsSync(file)) return []

    const entries: AuditEntry[] = []
    for (const line of fs.readFileSync(file, 'utf8').split('\n')) {
      if (!line.trim()) continue
      let parsed: unknown
      try {
        parsed = JSON.parse(line)
      } catch {
        continue // torn write
      }
      if (isAuditEntry(parsed) && (!type || parsed.type === type)) entries.push(parsed)
    }
    return entries.slice(-lines)
  }

  /** Resolves once buffered lines are on disk. */
  close(): Promise<void> {
    const stream = this.stream
    this.stream = null
    this.day = ''
    if (!stream) return Promise.resolve()
    return new Promise((resolve) => stream.end(() => resolve()))
  }

  private streamFor(day: string): fs.WriteStream {
    if (this.stream && day === this.day) return this.stream
    this.stream?.end()
    this.day = day
    this.stream = fs.createWriteStream(this.fileFor(day), { flags: 'a' })
    return this.stream
  }
}
