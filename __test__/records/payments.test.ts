import { describe, expect, it } from 'vitest'
import { MemoryPaymentRecords } from '../../src/records/payments'

describe('MemoryPaymentRecords', () => {
  it('hands back the latest token stored for a user', async () => {
    const records = new MemoryPaymentRecords()
    records.store('u1', '4000 0000 0000 0002')
    const latest = records.store('u1', '4111 1111 1111 1111')
    records.store('u2', '5555 5555 5555 4444')
    expect(await records.fetchStoredPaymentToken('u1')).toBe(latest)
    expect(await records.fetchStoredPaymentToken('nobody')).toBeNull()
  })

  it('never returns the card number in place of a token', async () => {
    const records = new MemoryPaymentRecords()
    const token = records.store('u1', '4111111111111111')
    expect(token).not.toBe('4111111111111111')
    expect(token).toMatch(/^[A-Za-z0-9_-]+$/)
  })

  it('approves up to the ceiling with the last four digits', async () => {
    const records = new MemoryPaymentRecords(100)
    const token = records.store('u1', '4111-1111-1111-1234')
    expect(await records.authorize(token, 100)).toEqual({
      approved: true,
      message: 'Approved $100 using vaulted token ending with 1234.',
    })
  })

  it('denies amounts above the ceiling and unknown tokens', async () => {
    const records = new MemoryPaymentRecords(100)
    const token = records.store('u1', '4111111111111111')
    expect(await records.authorize(token, 100.5)).toEqual({ approved: false, message: 'Amount exceeds $100 limit.' })
    expect(await records.authorize('test-token', 10)).toEqual({ approved: false, message: 'Invalid token.' })
  })

  it('keeps workflow records per user', async () => {
    const records = new MemoryPaymentRecords()
    await records.recordWorkflow('u1', { name: 'BookHotel', steps: ['a'], status: 'success' })
    await records.recordWorkflow('u2', { name: 'BookHotel', steps: ['b'], status: 'failed' })
    expect(records.workflows('u1')).toHaveLength(1)
    expect(records.workflows('u1')[0]).toMatchObject({ userId: 'u1', name: 'BookHotel', steps: ['a'], status: 'success' })
    expect(records.workflows()).toHaveLength(2)
  })
})
