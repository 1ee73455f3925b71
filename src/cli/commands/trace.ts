import { Command } from 'commander'
import { apiGet, exitOnError } from '../client'

export function traceCommands(program: Command): void {
  program
    .command('trace')
    .description("Print today's audit trail")
    .option('-n, --tail <n>', 'Number of entries', '50')
    .option('-t, --type <type>', 'Only one entry type (action|tool|guard|gate|loop)')
    .action(async (opts: { tail: string; type?: string }) => {
      const query = new URLSearchParams({ tail: opts.tail })
      if (opts.type) query.set('type', opts.type)
      const res = await apiGet(`/api/v1/trace?${query.toString()}`)
      exitOnError(res)
      const entries = Array.isArray(res.data.entries) ? res.data.entries : []
      for (const e of entries) console.log(JSON.stringify(e))
    })
}
