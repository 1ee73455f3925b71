import type { CheckoutBoundary } from '../sites/types'

export type StopGuardVerdict = { allowed: true } | { allowed: false; reason: string }

export interface StopGuardConfig {
  /** Largest charge that may go through. Unset means no price check. */
  maxPrice?: number
  /** Page that must never be acted on past; reaching it ends the session. */
  checkout?: CheckoutBoundary
}

/** Result of enforcing the irreversible-page boundary after a navigation. */
export type BoundaryStatus = 'stopped' | 'clear'

export const ALLOWED: StopGuardVerdict = { allowed: true }

export function blocked(reason: string): StopGuardVerdict {
  return { allowed: false, reason }
}

/** `Allowed` / `Blocked(<reason>)`, as printed in tool results. */
export function formatVerdict(v: StopGuardVerdict): string {
  return v.allowed ? 'Allowed' : `Blocked(${v.reason})`
}
