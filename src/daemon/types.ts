// Services the entrypoint attaches after buildServer(); both stay undefined in tests.
import type { AuditLogger } from '../audit/logger'
import type { BrowserManager } from '../browser/manager'

declare module 'fastify' {
  interface FastifyInstance {
    auditLogger: AuditLogger | undefined
    /** Source of the dialog history; absent when sessions come from another launcher. */
    browserManager: BrowserManager | undefined
  }
}
