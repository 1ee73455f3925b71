import path from 'path'
import { chromium, BrowserContext, Page } from 'playwright-core'
import type { Logger } from '../audit/log'
import { StepwardenConfig, profilesDir } from '../daemon/config'
import { PlaywrightDriver } from './playwright-driver'
import { BrowserSession, SessionUnavailableError } from './session'

export interface DialogEntry {
  ts: string
  type: string // 'alert' | 'confirm' | 'prompt' | 'beforeunload'
  message: string
  url: string
  action: 'dismissed'
}

export interface LaunchOptions {
  profile?: string
  headless?: boolean
}

/** What the daemon needs from a browser owner. */
export interface SessionLauncher {
  launch(opts?: LaunchOptions): Promise<BrowserSession>
  /** False when nothing was open. */
  close(): Promise<boolean>
}

/**
 * Starts Chromium and hands back the single BrowserSession the engine works
 * against. Launch and teardown are the only browser lifecycle it owns.
 */
export class BrowserManager implements SessionLauncher {
  private current: BrowserSession | null = null
  private dialogs: DialogEntry[] = []
  private readonly MAX_DIALOGS = 50

  constructor(
    private config: StepwardenConfig,
    private log: Logger,
  ) {}

  get session(): BrowserSession | null {
    return this.current?.isOpen ? this.current : null
  }

  getDialogs(): DialogEntry[] {
    return [...this.dialogs]
  }

  async launch(opts: LaunchOptions = {}): Promise<BrowserSession> {
    if (this.current?.isOpen) return this.current
    const profile = opts.profile ?? 'default'
    const headless = opts.headless ?? this.config.headless
    const userDataDir = path.join(profilesDir(this.config), profile)

    let context: BrowserContext
    try {
      context = await chromium.launchPersistentContext(userDataDir, {
        headless,
        args: [
          '--no-sandbox',
          '--disable-setuid-sandbox',
          '--disable-dev-shm-usage',
          '--no-first-run',
        ],
        viewport: { width: 1280, height: 1200 },
        locale: 'en-US',
      })
    } catch (err) {
      throw new SessionUnavailableError(
        `Failed to launch Chromium: ${err instanceof Error ? err.message : String(err)}`,
        err,
      )
    }

    const page = context.pages()[0] ?? (await context.newPage())
    this.attachDialogObserver(page)
    this.dialogs = []
    this.current = new BrowserSession(new PlaywrightDriver(context, page))
    this.log.info({ profile, headless }, 'browser session launched')
    return this.current
  }

  /** Returns false when there was nothing open to close. */
  async close(): Promise<boolean> {
    const s = this.current
    this.current = null
    return s ? s.close() : false
  }

  /** Dialogs would block every later action; dismiss and keep a record. */
  private attachDialogObserver(page: Page): void {
    page.on('dialog', async (dialog) => {
      this.dialogs.push({
        ts: new Date().toISOString(),
        type: dialog.type(),
        message: dialog.message(),
        url: page.url(),
        action: 'dismissed',
      })
      if (this.dialogs.length > this.MAX_DIALOGS) this.dialogs.splice(0, this.dialogs.length - this.MAX_DIALOGS)
      this.log.warn({ type: dialog.type(), message: dialog.message() }, 'dialog dismissed')
      await dialog.dismiss().catch(() => { /* page may have been closed */ })
    })
  }
}
