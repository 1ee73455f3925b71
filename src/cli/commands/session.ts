import { Command } from 'commander'
import { TASK_NAMES } from '../../agent/tasks'
import { apiDelete, apiGet, apiPost, exitOnError } from '../client'

export function sessionCommands(program: Command): void {
  const sess = program.command('session').description('Manage the browser session')

  sess
    .command('open <task>')
    .description(`Launch the browser with a task's tools (${TASK_NAMES.join('|')})`)
    .option('--headed', 'Launch in headed (visible) mode')
    .action(async (task: string, opts: { headed?: boolean }) => {
      const res = await apiPost('/api/v1/session', { task, headless: !opts.headed })
      exitOnError(res)
      console.log(`Opened ${String(res.data.task)} session`)
      console.log(`  Headless: ${String(res.data.headless)}`)
    })

  sess
    .command('show')
    .description('Show the current session')
    .action(async () => {
      const res = await apiGet('/api/v1/session')
      if (res.statusCode === 404) {
        console.log('No session.')
        return
      }
      exitOnError(res)
      console.log(JSON.stringify(res.data, null, 2))
    })

  sess
    .command('close')
    .description('Close the browser session')
    .action(async () => {
      const res = await apiDelete('/api/v1/session')
      exitOnError(res)
      console.log(res.data.status === 'closed' ? 'Browser closed.' : 'Browser already closed.')
    })

  sess
    .command('dialogs')
    .description('List dialogs that were auto-dismissed')
    .option('-n, --tail <n>', 'Only the last N dialogs')
    .action(async (opts: { tail?: string }) => {
      const res = await apiGet(`/api/v1/session/dialogs${opts.tail ? `?tail=${encodeURIComponent(opts.tail)}` : ''}`)
      exitOnError(res)
      console.log(JSON.stringify(res.data.dialogs ?? [], null, 2))
    })
}
