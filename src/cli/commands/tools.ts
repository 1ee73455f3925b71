import { Command } from 'commander'
import { apiGet, apiPost, exitOnError, Json } from '../client'

export function parseArgsOption(raw: string | undefined): Record<string, unknown> {
  if (!raw) return {}
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new Error(`--args is not valid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('--args must be a JSON object')
  }
  return { ...parsed }
}

export function toolCommands(program: Command): void {
  program
    .command('tools')
    .description("List the current session's tools")
    .action(async () => {
      const res = await apiGet('/api/v1/tools')
      exitOnError(res)
      const tools = Array.isArray(res.data.tools) ? res.data.tools : []
      for (const t of tools) {
        if (typeof t !== 'object' || t === null) continue
        const tool: Json = { ...t }
        const params: unknown[] = Array.isArray(tool.params) ? tool.params : []
        const names = params.map((p) => (typeof p === 'object' && p !== null && 'name' in p ? String(p.name) : '?'))
        console.log(`  ${String(tool.name)}(${names.join(', ')})  ${String(tool.description)}`)
      }
    })

  program
    .command('call <tool>')
    .description('Invoke a tool and print its status string')
    .option('-a, --args <json>', 'Arguments as a JSON object', '')
    .action(async (tool: string, opts: { args: string }) => {
      const res = await apiPost(`/api/v1/tools/${encodeURIComponent(tool)}`, { args: parseArgsOption(opts.args) })
      exitOnError(res)
      console.log(String(res.data.result))
    })
}
