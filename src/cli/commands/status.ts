import { apiGet, Json } from '../client'

function describeSession(session: unknown): string {
  if (typeof session !== 'object' || session === null) return 'none'
  const s: Json = { ...session }
  const reason = s.reason ? ` (${String(s.reason)})` : ''
  return `${String(s.task)} state=${String(s.state)}${reason} headless=${String(s.headless)} created=${String(s.createdAt)}`
}

export async function showStatus(): Promise<void> {
  let data: Json
  try {
    data = (await apiGet('/api/v1/status')).data
  } catch {
    console.log('stepwarden daemon is NOT running')
    return
  }
  console.log('stepwarden daemon RUNNING')
  console.log(`  PID:      ${String(data.pid)}`)
  console.log(`  Uptime:   ${String(data.uptime_s)}s`)
  console.log(`  Session:  ${describeSession(data.session)}`)
  if (data.gate_pending) console.log('  Gate:     waiting for operator (stepwarden resume)')
  if (data.guard_tripped) console.log(`  Guard:    ${String(data.guard_tripped)}`)
}
