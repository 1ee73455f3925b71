import { FastifyInstance } from 'fastify'
import { TASK_NAMES, isTaskName } from '../../agent/tasks'
import type { SessionHolder } from '../session'
import { sendEngineError } from './errors'
import '../types'

export function registerSessionRoutes(server: FastifyInstance, holder: SessionHolder): void {
  // POST /api/v1/session: launch the browser and bind a task's tools to it
  server.post<{ Body: { task?: string; headless?: boolean } }>('/api/v1/session', async (req, reply) => {
    const { task, headless } = req.body ?? {}
    if (!task || !isTaskName(task)) {
      return reply.code(400).send({
        error: 'preflight_failed',
        field: 'task',
        constraint: `one of ${TASK_NAMES.join(', ')}`,
      })
    }
    if (headless !== undefined && typeof headless !== 'boolean') {
      return reply.code(400).send({ error: 'preflight_failed', field: 'headless', constraint: 'must be a boolean' })
    }
    try {
      await holder.open(task, headless)
    } catch (err) {
      return sendEngineError(reply, err)
    }
    return reply.code(201).send(holder.info())
  })

  server.get('/api/v1/session', async (_req, reply) => {
    const info = holder.info()
    if (!info) return reply.code(404).send({ error: 'no_session' })
    return info
  })

  server.delete('/api/v1/session', async () => {
    const closed = await holder.close()
    return { status: closed ? 'closed' : 'already_closed' }
  })

  /** Auto-dismissed dialogs of the current browser. */
  server.get<{ Querystring: { tail?: string } }>('/api/v1/session/dialogs', async (req) => {
    const tail = req.query.tail ? parseInt(req.query.tail, 10) : undefined
    const dialogs = server.browserManager?.getDialogs() ?? []
    return { dialogs: tail && tail > 0 ? dialogs.slice(-tail) : dialogs }
  })
}
