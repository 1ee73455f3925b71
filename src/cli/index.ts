#!/usr/bin/env node
import os from 'os'
import path from 'path'
import { Command, InvalidArgumentError } from 'commander'
import { startDaemon } from './commands/start'
import { stopDaemon } from './commands/stop'
import { showStatus } from './commands/status'
import { sessionCommands } from './commands/session'
import { toolCommands } from './commands/tools'
import { gateCommands } from './commands/gate'
import { traceCommands } from './commands/trace'
import { runTask } from './commands/run'
import { TASK_NAMES } from '../agent/tasks'

const DEFAULT_DATA_DIR = process.env.STEPWARDEN_DATA_DIR ?? path.join(os.homedir(), '.stepwarden')

function toNumber(value: string): number {
  const n = Number(value)
  if (!Number.isFinite(n)) throw new InvalidArgumentError('Not a number.')
  return n
}

function toInt(value: string): number {
  const n = toNumber(value)
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.')
  return n
}

const program = new Command()

program
  .name('stepwarden')
  .description('stepwarden: guarded browser automation for planner-driven tasks')
  .version('0.1.0')

program
  .command('start')
  .description('Start the stepwarden daemon')
  .option('-p, --port <port>', 'Port to listen on', process.env.STEPWARDEN_PORT ?? '19420')
  .option('-d, --data-dir <dir>', 'Data directory', DEFAULT_DATA_DIR)
  .option('-l, --log-level <level>', 'Log level (trace|debug|info|warn|error)', 'info')
  .option('--headed', 'Launch browsers in headed (visible) mode')
  .action(startDaemon)

program
  .command('stop')
  .description('Stop the running stepwarden daemon')
  .option('-d, --data-dir <dir>', 'Data directory', DEFAULT_DATA_DIR)
  .action(stopDaemon)

program
  .command('status')
  .description('Show daemon status')
  .action(showStatus)

sessionCommands(program)
toolCommands(program)
gateCommands(program)
traceCommands(program)

program
  .command('run <task>')
  .description(`Run a task's script in-process with a console human gate (${TASK_NAMES.join('|')})`)
  .option('--headed', 'Launch in headed (visible) mode')
  .option('--max-steps <n>', 'Step budget', toInt)
  .option('--script <file>', 'JSON array of { tool, args } calls to replay instead of the default script')
  .option('-d, --data-dir <dir>', 'Data directory', DEFAULT_DATA_DIR)
  .option('-l, --log-level <level>', 'Log level', 'info')
  .option('--base-url <url>', 'Site base URL (banking)')
  .option('--username <username>', 'Account username (banking)')
  .option('--password <password>', 'Account password (banking)')
  .option('--query <text>', 'Search query (shopping)')
  .option('--max-price <usd>', 'Price ceiling (shopping)', toNumber)
  .option('--city <name>', 'Destination (hotel)')
  .option('--checkin <date>', 'Check-in YYYY-MM-DD (hotel)')
  .option('--checkout <date>', 'Check-out YYYY-MM-DD (hotel)')
  .option('--adults <n>', 'Adults (hotel)', toInt)
  .option('--rooms <n>', 'Rooms (hotel)', toInt)
  .option('--min-stars <n>', 'Minimum stars (hotel)', toInt)
  .option('--user-id <id>', 'Account whose stored payment token is used (hotel)')
  .option('--amount <usd>', 'Charge to authorize (hotel)', toNumber)
  .option('--card <number>', 'Card number to vault for --user-id before the run (hotel)')
  .action(runTask)

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : String(err))
  process.exit(1)
})
