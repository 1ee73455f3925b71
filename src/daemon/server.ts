import Fastify, { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify'
import { loggerOptions } from '../audit/log'
import { AUDIT_TYPES } from '../audit/logger'
import { StepwardenConfig } from './config'
import { SessionHolder } from './session'
import { registerGateRoutes } from './routes/gate'
import { registerSessionRoutes } from './routes/session'
import { registerToolRoutes } from './routes/tools'
import './types'

export const VERSION = '0.1.0'

export function buildServer(config: StepwardenConfig, holder: SessionHolder): FastifyInstance {
  const server = Fastify({ logger: loggerOptions(config.logLevel) })
  server.decorate('auditLogger', undefined)
  server.decorate('browserManager', undefined)

  // API token authentication (only enforced when STEPWARDEN_API_TOKEN is set)
  if (config.apiToken) {
    server.addHook('preHandler', async (req: FastifyRequest, reply: FastifyReply) => {
      if (req.url === '/health') return

      const xToken = req.headers['x-api-token']
      const authHeader = req.headers['authorization']
      const bearerToken = authHeader?.startsWith('Bearer ') ? authHeader.slice(7) : undefined
      const provided = (typeof xToken === 'string' ? xToken : undefined) ?? bearerToken

      if (provided !== config.apiToken) {
        return reply.code(401).send({ error: 'Unauthorized: provide X-API-Token or Authorization: Bearer <token>' })
      }
    })
  }

  // auth-exempt
  server.get('/health', async () => {
    return {
      status: 'ok',
      version: VERSION,
      uptime_s: Math.floor(process.uptime()),
      session_open: holder.current?.ctx.session.isOpen ?? false,
    }
  })

  server.get('/api/v1/status', async () => {
    return {
      pid: process.pid,
      uptime_s: Math.floor(process.uptime()),
      session: holder.info(),
      gate_pending: holder.gate.pending,
      guard_tripped: holder.current?.ctx.guard.tripReason ?? null,
    }
  })

  // GET /api/v1/trace?tail=N&type=tool: today's audit entries
  server.get<{ Querystring: { tail?: string; type?: string } }>('/api/v1/trace', async (req, reply) => {
    const logger = server.auditLogger
    if (!logger) return reply.code(503).send({ error: 'Audit logger not initialized' })
    const tail = req.query.tail ? parseInt(req.query.tail, 10) : 50
    const type = AUDIT_TYPES.find((t) => t === req.query.type)
    if (req.query.type && !type) {
      return reply.code(400).send({ error: 'preflight_failed', field: 'type', constraint: `one of ${AUDIT_TYPES.join(', ')}` })
    }
    return { entries: logger.tail(Number.isFinite(tail) && tail > 0 ? tail : 50, type) }
  })

  registerSessionRoutes(server, holder)
  registerToolRoutes(server, holder)
  registerGateRoutes(server, holder)

  return server
}
