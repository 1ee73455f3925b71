import { FastifyInstance } from 'fastify'
import type { SessionHolder } from '../session'
import { sendEngineError } from './errors'
import '../types'

export function registerToolRoutes(server: FastifyInstance, holder: SessionHolder): void {
  server.get('/api/v1/tools', async (_req, reply) => {
    const runtime = holder.current
    if (!runtime) return reply.code(404).send({ error: 'no_session' })
    return { task: runtime.task.name, tools: runtime.registry.describe() }
  })

  // POST /api/v1/tools/:name blocks while a human gate is pending
  server.post<{ Params: { name: string }; Body: { args?: Record<string, unknown> } }>(
    '/api/v1/tools/:name',
    async (req, reply) => {
      const runtime = holder.current
      if (!runtime) return reply.code(404).send({ error: 'no_session' })
      const args = req.body?.args ?? {}
      if (typeof args !== 'object' || Array.isArray(args)) {
        return reply.code(400).send({ error: 'preflight_failed', field: 'args', constraint: 'must be an object' })
      }
      try {
        const result = await runtime.registry.invoke(req.params.name, args)
        return { tool: req.params.name, result }
      } catch (err) {
        return sendEngineError(reply, err)
      }
    },
  )
}
