import fs from 'fs'
import os from 'os'
import path from 'path'
import { PassThrough } from 'stream'
import { describe, expect, it } from 'vitest'
import { AuditLogger } from '../../src/audit/logger'
import {
  ChannelResult,
  ConsoleResumeChannel,
  HumanGate,
  ManualResumeChannel,
  ResumeChannel,
} from '../../src/gate/human-gate'
import { silentLog } from '../helpers/context'

/** A console that is already gone. */
class SeveredChannel implements ResumeChannel {
  cancelled = 0
  async wait(): Promise<ChannelResult> {
    return 'closed'
  }
  cancel(): void {
    this.cancelled++
  }
}

function gate(channel: ResumeChannel, pollIntervalMs = 20, pollAttempts = 3, audit?: AuditLogger) {
  const banners: string[] = []
  const g = new HumanGate(channel, silentLog, { pollIntervalMs, pollAttempts, render: (t) => banners.push(t) }, audit)
  return { gate: g, banners }
}

async function releases(audit: AuditLogger): Promise<unknown[]> {
  await audit.close()
  return audit.tail(50, 'gate').filter((e) => e.action === 'resume').map((e) => e.result?.via)
}

function tick(ms = 0): Promise<void> {
  return new Promise((r) => setTimeout(r, ms))
}

describe('HumanGate', () => {
  it('blocks until resumed and shows the prompt', async () => {
    const { gate: g, banners } = gate(new ManualResumeChannel(), 1000, 5)
    let done = false
    const waiting = g.request('Solve the CAPTCHA').then((r) => {
      done = true
      return r
    })
    await tick(30)
    expect(done).toBe(false)
    expect(g.pending?.prompt).toBe('Solve the CAPTCHA')
    expect(banners[0]).toContain('HUMAN GATE')
    expect(banners[0]).toContain('Solve the CAPTCHA')

    expect(g.resume()).toBe(true)
    expect(await waiting).toBe('human_done')
    expect(g.pending).toBeNull()
  })

  it('reports nothing to resume when idle', () => {
    expect(gate(new ManualResumeChannel()).gate.resume()).toBe(false)
  })

  it('refuses a second request while one is pending', async () => {
    const { gate: g } = gate(new ManualResumeChannel())
    const first = g.request('one')
    await expect(g.request('two')).rejects.toThrow('Human gate already pending')
    g.resume()
    await first
  })

  it('releases after the poll fallback when the console is gone', async () => {
    const channel = new SeveredChannel()
    const { gate: g } = gate(channel, 20, 3)
    const t0 = Date.now()
    expect(await g.request('continue?')).toBe('human_done')
    expect(Date.now() - t0).toBeGreaterThanOrEqual(45)
    expect(channel.cancelled).toBe(1)
    expect(g.pending).toBeNull()
  })

  it('gives control back after the poll budget when there is no console', async () => {
    const { gate: g } = gate(new ManualResumeChannel(), 20, 3)
    const outcome = await Promise.race([
      g.request('solve it'),
      new Promise<'still_pending'>((r) => setTimeout(() => r('still_pending'), 1000)),
    ])
    expect(outcome).toBe('human_done')
    expect(g.pending).toBeNull()
  })

  it('records how each gate was released', async () => {
    const audit = new AuditLogger(fs.mkdtempSync(path.join(os.tmpdir(), 'stepwarden-gate-')))

    const manual = gate(new ManualResumeChannel(), 1000, 5, audit).gate
    const resumed = manual.request('by signal')
    await tick(10)
    manual.resume()
    await resumed

    const input = new PassThrough()
    const consoled = gate(new ConsoleResumeChannel(input), 1000, 5, audit).gate
    const typed = consoled.request('by console')
    await tick(10)
    input.write('\n')
    await typed

    await gate(new ManualResumeChannel(), 10, 2, audit).gate.request('by timeout')

    expect(await releases(audit)).toEqual(['signal', 'channel', 'poll_timeout'])
  })

  it('can still be resumed during the poll fallback', async () => {
    const { gate: g } = gate(new SeveredChannel(), 1000, 100)
    const t0 = Date.now()
    const waiting = g.request('continue?')
    await tick(20)
    g.resume()
    expect(await waiting).toBe('human_done')
    expect(Date.now() - t0).toBeLessThan(900)
  })
})

describe('ConsoleResumeChannel', () => {
  it('resumes on one line of input', async () => {
    const input = new PassThrough()
    const channel = new ConsoleResumeChannel(input)
    const waiting = channel.wait()
    input.write('\n')
    expect(await waiting).toBe('resumed')
  })

  it('reports closed at end of input', async () => {
    const input = new PassThrough()
    const channel = new ConsoleResumeChannel(input)
    const waiting = channel.wait()
    input.end()
    expect(await waiting).toBe('closed')
  })

  it('reports closed for a stream that can no longer be read', async () => {
    const input = new PassThrough()
    input.destroy()
    expect(await new ConsoleResumeChannel(input).wait()).toBe('closed')
  })

  it('drives a gate from the console', async () => {
    const input = new PassThrough()
    const { gate: g } = gate(new ConsoleResumeChannel(input))
    const waiting = g.request('press enter')
    await tick(10)
    input.write('ok\n')
    expect(await waiting).toBe('human_done')
  })
})
