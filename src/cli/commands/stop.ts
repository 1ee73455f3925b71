import fs from 'fs'
import { pidFile, resolveConfig } from '../../daemon/config'
import { sleep } from '../../util/time'

interface StopOptions {
  dataDir: string
}

function isMissingProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH'
}

export async function stopDaemon(opts: StopOptions): Promise<void> {
  const pidPath = pidFile(resolveConfig({ dataDir: opts.dataDir }))

  if (!fs.existsSync(pidPath)) {
    console.log('No daemon PID file found; daemon is not running.')
    return
  }

  const pid = parseInt(fs.readFileSync(pidPath, 'utf8').trim(), 10)
  if (Number.isNaN(pid)) {
    console.error('Invalid PID file. Removing.')
    fs.rmSync(pidPath, { force: true })
    return
  }

  try {
    process.kill(pid, 'SIGTERM')
  } catch (err) {
    if (!isMissingProcess(err)) throw err
    console.log('Daemon process not found (already stopped). Cleaning up PID file.')
    fs.rmSync(pidPath, { force: true })
    return
  }
  console.log(`✓ Sent SIGTERM to daemon (PID ${pid})`)

  // the daemon removes its PID file on a clean exit; closing the browser can take a moment
  for (let waited = 0; fs.existsSync(pidPath) && waited < 8000; waited += 200) {
    await sleep(200)
  }
  if (!fs.existsSync(pidPath)) {
    console.log('✓ Daemon stopped.')
    return
  }
  console.warn('Daemon did not exit cleanly within 8s. Sending SIGKILL…')
  try {
    process.kill(pid, 'SIGKILL')
  } catch (err) {
    if (!isMissingProcess(err)) throw err
  }
  fs.rmSync(pidPath, { force: true })
}
