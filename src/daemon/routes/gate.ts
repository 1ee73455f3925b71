import { FastifyInstance } from 'fastify'
import type { SessionHolder } from '../session'
import '../types'

export function registerGateRoutes(server: FastifyInstance, holder: SessionHolder): void {
  server.get('/api/v1/gate', async () => {
    return { pending: holder.gate.pending }
  })

  server.post('/api/v1/gate/resume', async (_req, reply) => {
    const pending = holder.gate.pending
    if (!pending) return reply.code(409).send({ error: 'no_pending_gate' })
    holder.gate.resume()
    return { status: 'resumed', gate_id: pending.id }
  })
}
