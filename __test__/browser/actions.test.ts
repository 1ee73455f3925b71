import fs from 'fs'
import os from 'os'
import path from 'path'
import { describe, expect, it, vi } from 'vitest'
import { ActionExecutor } from '../../src/browser/actions'
import { css } from '../../src/browser/selectors'
import { BrowserSession, SessionTerminatedError } from '../../src/browser/session'
import { AuditLogger } from '../../src/audit/logger'
import { DomDriver } from '../helpers/dom-driver'
import { silentLog } from '../helpers/context'

const HOME = 'http://site.test/'

function setup(body: string, audit?: AuditLogger) {
  const driver = new DomDriver({ [HOME]: `<html><body>${body}</body></html>` }, HOME)
  const session = new BrowserSession(driver)
  const executor = new ActionExecutor(session, silentLog, audit, { retries: 2, pollIntervalMs: 10 })
  return { driver, session, executor }
}

describe('ActionExecutor.click', () => {
  it('clicks natively when nothing is in the way', async () => {
    const { driver, executor } = setup('<button id="go">Go</button>')
    const outcome = await executor.click([css('#go')])
    expect(outcome).toEqual({ kind: 'clicked', status: 'clicked:native', index: 0, mechanism: 'native', attempts: 1 })
    expect(driver.scrolledIntoView).toEqual(['go'])
    expect(driver.clicks).toEqual([{ id: 'go', mechanism: 'native' }])
  })

  it('falls back to a programmatic click when the native one is intercepted', async () => {
    const { driver, executor } = setup('<button id="go" data-fail-native>Go</button>')
    const outcome = await executor.click([css('#go')])
    expect(outcome.status).toBe('clicked:programmatic')
    expect(driver.clicks).toEqual([{ id: 'go', mechanism: 'programmatic' }])
  })

  it('falls back for a hidden element', async () => {
    const { executor } = setup('<button id="go" hidden>Go</button>')
    expect((await executor.click([css('#go')])).status).toBe('clicked:programmatic')
  })

  it('retries after both mechanisms fail once', async () => {
    const { driver, executor } = setup('<button id="go" data-fail-native data-fail-dispatch="1">Go</button>')
    const outcome = await executor.click([css('#go')])
    expect(outcome).toMatchObject({ kind: 'clicked', mechanism: 'programmatic', attempts: 2 })
    expect(driver.clicks).toHaveLength(1)
  })

  it('gives up after the configured retries', async () => {
    const { driver, executor } = setup('<button id="go" data-fail-native data-fail-dispatch>Go</button>')
    const query = vi.spyOn(driver, 'query')
    const outcome = await executor.click([css('#go')])
    expect(outcome).toEqual({
      kind: 'execution_failed',
      status: 'execution_failed:element intercepts pointer events; dispatch rejected',
      error: 'element intercepts pointer events; dispatch rejected',
    })
    // first lookup plus one re-resolve per retry
    expect(query).toHaveBeenCalledTimes(3)
    expect(driver.clicks).toHaveLength(0)
  })

  it('honours a per-call retry count', async () => {
    const { driver, executor } = setup('<button id="go" data-fail-native data-fail-dispatch>Go</button>')
    const query = vi.spyOn(driver, 'query')
    expect((await executor.click([css('#go')], { retries: 0 })).kind).toBe('execution_failed')
    expect(query).toHaveBeenCalledTimes(1)
  })

  it('reports not_found without clicking', async () => {
    const { driver, executor } = setup('<p>nothing</p>')
    expect(await executor.click([css('#go')])).toEqual({ kind: 'not_found', status: 'not_found' })
    expect(driver.clicks).toEqual([])
  })

  it('does not scroll when asked not to', async () => {
    const { driver, executor } = setup('<button id="go">Go</button>')
    await executor.click([css('#go')], { scroll: false })
    expect(driver.scrolledIntoView).toEqual([])
  })

  it('polls for a late element only when given a timeout', async () => {
    const { driver, executor } = setup('<p>loading</p>')
    expect((await executor.click([css('#late')])).kind).toBe('not_found')

    setTimeout(() => driver.document.body.insertAdjacentHTML('beforeend', '<button id="late">Late</button>'), 30)
    const outcome = await executor.click([css('#late')], { timeoutMs: 1000 })
    expect(outcome.status).toBe('clicked:native')
  })

  it('stops polling at the timeout', async () => {
    const { executor } = setup('<p>loading</p>')
    const t0 = Date.now()
    expect((await executor.click([css('#late')], { timeoutMs: 60 })).kind).toBe('not_found')
    expect(Date.now() - t0).toBeLessThan(1000)
  })

  it('throws once the session is terminated', async () => {
    const { session, executor } = setup('<button id="go">Go</button>')
    await session.terminate('checkout reached')
    await expect(executor.click([css('#go')])).rejects.toBeInstanceOf(SessionTerminatedError)
  })
})

describe('ActionExecutor.type', () => {
  it('clears the field before typing', async () => {
    const { driver, executor } = setup('<input id="user" value="old">')
    const outcome = await executor.type([css('#user')], 'alice')
    expect(outcome).toEqual({ kind: 'typed', status: 'typed', index: 0, cleared: true })
    expect(await (await driver.query('css', '#user'))[0].value()).toBe('alice')
  })

  it('types anyway when clearing fails', async () => {
    const { driver, executor } = setup('<input id="user" value="old" data-fail-clear>')
    const outcome = await executor.type([css('#user')], 'alice')
    expect(outcome).toMatchObject({ kind: 'typed', cleared: false })
    expect(await (await driver.query('css', '#user'))[0].value()).toBe('oldalice')
  })

  it('reports a non-editable target as a failure', async () => {
    const { executor } = setup('<div id="d">text</div>')
    const outcome = await executor.type([css('#d')], 'x')
    expect(outcome.status).toBe('execution_failed:element is not editable')
  })

  it('reports a missing field as not_found', async () => {
    const { executor } = setup('<p>no form</p>')
    expect((await executor.type([css('#user')], 'x')).kind).toBe('not_found')
  })
})

describe('ActionExecutor.press', () => {
  it('maps key names case-insensitively', async () => {
    const { driver, executor } = setup('<p>page</p>')
    const outcome = await executor.press('enter')
    expect(outcome).toEqual({ kind: 'key_pressed', status: 'pressed:enter', key: 'Enter' })
    expect(driver.keys).toEqual(['Enter'])
  })

  it('rejects keys outside the table', async () => {
    const { driver, executor } = setup('<p>page</p>')
    const outcome = await executor.press('F13')
    expect(outcome).toEqual({ kind: 'execution_failed', status: 'Unsupported key: F13', error: 'Unsupported key: F13' })
    expect(driver.keys).toEqual([])
  })
})

describe('ActionExecutor navigation', () => {
  it('returns a failed step when the page cannot load', async () => {
    const { driver, executor } = setup('<p>page</p>')
    driver.failGoto = true
    expect(await executor.navigate('http://other.test/')).toEqual({ ok: false, error: 'net::ERR_NAME_NOT_RESOLVED' })
  })
})

describe('action audit', () => {
  it('writes one redacted entry per typing action', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stepwarden-audit-'))
    const audit = new AuditLogger(dir)
    const { executor } = setup('<input id="pw" type="password">', audit)
    await executor.type([css('#pw')], 'test-secret', { purpose: 'LOGIN_PASSWORD' })
    await audit.close()

    const entries = audit.tail(10, 'action')
    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({
      type: 'action',
      action: 'type',
      url: HOME,
      selector: '#pw',
      params: { candidate_index: 0, purpose: 'LOGIN_PASSWORD', value: '[REDACTED]' },
      result: { kind: 'typed', status: 'typed' },
    })
    expect(JSON.stringify(entries[0])).not.toContain('test-secret')
    fs.rmSync(dir, { recursive: true, force: true })
  })
})
