import { spawn } from 'child_process'
import http from 'http'
import path from 'path'
import { sleep } from '../../util/time'

interface StartOptions {
  port: string
  dataDir: string
  logLevel: string
  headed?: boolean
}

const READY_TIMEOUT_MS = 5000

/** Environment for the detached daemon: the CLI flags win over inherited STEPWARDEN_* values. */
function daemonEnv(port: number, opts: StartOptions): NodeJS.ProcessEnv {
  return {
    ...process.env,
    STEPWARDEN_PORT: String(port),
    STEPWARDEN_DATA_DIR: opts.dataDir,
    STEPWARDEN_LOG_LEVEL: opts.logLevel,
    ...(opts.headed ? { STEPWARDEN_HEADLESS: 'false' } : {}),
  }
}

/** True when something answers /health with 200 on the port. */
export function isRunning(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const req = http.get({ host: '127.0.0.1', port, path: '/health', timeout: 500 }, (res) => {
      res.resume()
      resolve(res.statusCode === 200)
    })
    req.on('timeout', () => req.destroy())
    req.on('error', () => resolve(false))
  })
}

async function waitUntilHealthy(port: number, timeoutMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs
  await sleep(500) // bind time
  while (Date.now() < deadline) {
    if (await isRunning(port)) return true
    await sleep(300)
  }
  return false
}

export async function startDaemon(opts: StartOptions): Promise<void> {
  const port = parseInt(opts.port, 10)
  if (await isRunning(port)) {
    console.log(`stepwarden daemon already running on port ${port}`)
    return
  }

  const entry = path.join(__dirname, '../../daemon/index.js')
  const child = spawn(process.execPath, [entry], { env: daemonEnv(port, opts), detached: true, stdio: 'inherit' })
  child.unref()
  console.log(`stepwarden daemon starting on port ${port} (PID ${child.pid})…`)

  if (!(await waitUntilHealthy(port, READY_TIMEOUT_MS))) {
    console.error(`✗ Daemon did not become ready within ${READY_TIMEOUT_MS / 1000} seconds. Check logs.`)
    process.exit(1)
  }
  console.log(`✓ stepwarden daemon ready at http://127.0.0.1:${port}${opts.headed ? ' (headed)' : ''}`)
}
