import { describe, expect, it } from 'vitest'
import { BrowserSession, SessionTerminatedError } from '../../src/browser/session'
import { StopGuard } from '../../src/policy/guard'
import { formatVerdict } from '../../src/policy/types'
import { shoppingSite } from '../../src/sites/shopping'
import { DomDriver } from '../helpers/dom-driver'
import { silentLog } from '../helpers/context'

const CHECKOUT = 'https://www.amazon.com/checkout/p/p-1/spc?pipelineType=chewbacca'

describe('StopGuard.checkPrice', () => {
  const guard = new StopGuard({ maxPrice: 200 }, silentLog)

  it('allows an amount exactly at the ceiling', () => {
    expect(guard.checkPrice(200)).toEqual({ allowed: true })
  })

  it('blocks anything above the ceiling', () => {
    expect(guard.checkPrice(201)).toEqual({ allowed: false, reason: 'exceeds limit' })
    expect(guard.checkPrice(200.01)).toEqual({ allowed: false, reason: 'exceeds limit' })
  })

  it('blocks a price it could not read', () => {
    expect(guard.checkPrice(null)).toEqual({ allowed: false, reason: 'price unknown' })
    expect(guard.checkPrice(Number.NaN)).toEqual({ allowed: false, reason: 'price unknown' })
  })

  it('takes a per-call ceiling', () => {
    expect(guard.checkPrice(50, 40)).toEqual({ allowed: false, reason: 'exceeds limit' })
  })

  it('allows everything without a ceiling', () => {
    expect(new StopGuard({}, silentLog).checkPrice(1_000_000)).toEqual({ allowed: true })
  })

  it('formats verdicts for tool results', () => {
    expect(formatVerdict(guard.checkPrice(10))).toBe('Allowed')
    expect(formatVerdict(guard.checkPrice(999))).toBe('Blocked(exceeds limit)')
  })
})

describe('StopGuard.enforceBoundary', () => {
  it('terminates the session on the checkout page', async () => {
    const driver = new DomDriver({}, CHECKOUT)
    const session = new BrowserSession(driver)
    const guard = new StopGuard({ checkout: shoppingSite.checkout }, silentLog)

    expect(await guard.enforceBoundary(session)).toBe('stopped')
    expect(session.state).toBe('terminated')
    expect(driver.closed).toBe(true)
    expect(guard.tripped).toBe(true)
    expect(guard.tripReason).toBe(`irreversible checkout reached: ${CHECKOUT}`)
    expect(() => session.driver).toThrow(SessionTerminatedError)
  })

  it('leaves other pages alone', async () => {
    const session = new BrowserSession(new DomDriver({}, 'https://www.amazon.com/gp/cart/view.html'))
    const guard = new StopGuard({ checkout: shoppingSite.checkout }, silentLog)
    expect(await guard.enforceBoundary(session)).toBe('clear')
    expect(session.isOpen).toBe(true)
    expect(guard.tripped).toBe(false)
  })

  it('is clear on a session that is already closed', async () => {
    const session = new BrowserSession(new DomDriver({}, CHECKOUT))
    await session.close()
    const guard = new StopGuard({ checkout: shoppingSite.checkout }, silentLog)
    expect(await guard.enforceBoundary(session)).toBe('clear')
  })
})
