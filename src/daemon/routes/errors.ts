import { FastifyReply } from 'fastify'
import { SessionTerminatedError, SessionUnavailableError } from '../../browser/session'
import { SessionConflictError } from '../session'

/** Send the engine's typed failures as HTTP errors; anything else is rethrown. */
export function sendEngineError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof SessionTerminatedError) {
    return reply.code(409).send({ error: 'session_terminated', state: err.state, message: err.message })
  }
  if (err instanceof SessionConflictError) {
    return reply.code(409).send({ error: 'session_exists', task: err.task, message: err.message })
  }
  if (err instanceof SessionUnavailableError) {
    return reply.code(503).send({ error: 'session_unavailable', message: err.message.slice(0, 300) })
  }
  throw err
}
