import type { AuditLogger } from '../audit/logger'
import type { Logger } from '../audit/log'
import { ActionExecutor } from '../browser/actions'
import type { BrowserSession } from '../browser/session'
import type { StepwardenConfig } from '../daemon/config'
import type { HumanGate } from '../gate/human-gate'
import { StopGuard } from '../policy/guard'
import type { PaymentRecords } from '../records/payments'
import type { SiteProfile } from '../sites/types'
import { PageStateDetector } from '../state/detector'

/** Everything a tool may touch. One per live session. */
export interface ToolContext {
  session: BrowserSession
  site: SiteProfile
  executor: ActionExecutor
  detector: PageStateDetector
  guard: StopGuard
  gate: HumanGate
  records: PaymentRecords
  config: StepwardenConfig
  log: Logger
  audit?: AuditLogger
}

export interface ContextDeps {
  session: BrowserSession
  site: SiteProfile
  gate: HumanGate
  records: PaymentRecords
  config: StepwardenConfig
  log: Logger
  audit?: AuditLogger
}

export function createToolContext(deps: ContextDeps): ToolContext {
  const { session, site, config, log, audit } = deps
  return {
    ...deps,
    executor: new ActionExecutor(session, log.child({ component: 'executor' }), audit, {
      retries: config.clickRetries,
      pollIntervalMs: config.pollIntervalMs,
    }),
    detector: new PageStateDetector(session, site, config.pollIntervalMs),
    guard: new StopGuard(
      { maxPrice: config.maxPrice, checkout: site.checkout },
      log.child({ component: 'guard' }),
      audit,
    ),
  }
}
