import { Command } from 'commander'
import { apiGet, apiPost, exitOnError } from '../client'

export function gateCommands(program: Command): void {
  program
    .command('gate')
    .description('Show the pending human gate, if any')
    .action(async () => {
      const res = await apiGet('/api/v1/gate')
      exitOnError(res)
      const pending = res.data.pending
      if (typeof pending !== 'object' || pending === null) {
        console.log('No human gate pending.')
        return
      }
      console.log(JSON.stringify(pending, null, 2))
    })

  program
    .command('resume')
    .description('Release the pending human gate')
    .action(async () => {
      const res = await apiPost('/api/v1/gate/resume')
      if (res.statusCode === 409) {
        console.log('No human gate pending.')
        return
      }
      exitOnError(res)
      console.log(`✓ Resumed ${String(res.data.gate_id)}`)
    })
}
