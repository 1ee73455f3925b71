import { css, xpath } from '../browser/selectors'
import type { SiteProfile } from './types'

export const bankingSite: SiteProfile = {
  name: 'banking',
  baseUrl: 'http://127.0.0.1:5000/',
  loginUrlMarkers: ['login'],
  selectors: {
    HEADER_LOGIN: [
      css("a[id='gnav_login'], a[href*='login'], button[data-testid='login']"),
      xpath("//a[contains(@href,'login')][contains(.,'Sign in') or contains(.,'Log in') or contains(.,'Sign In')]"),
      xpath("//button[contains(.,'Sign in') or contains(.,'Log in')]"),
    ],
    LOGIN_USERNAME: [
      css("input[id='eliloUserID']"),
      xpath("//input[@id='userid' or @name='username' or @type='email']"),
    ],
    LOGIN_PASSWORD: [
      css("input[id='eliloPassword']"),
      xpath("//input[@id='password' or @name='password' or @type='password']"),
    ],
    LOGIN_SUBMIT: [
      css("button#login-submit, button[type='submit'], button[data-testid='login-submit']"),
      xpath("//button[@type='submit' or @id='login-submit' or @data-testid='login-submit']"),
    ],
    DASHBOARD_MARKER: [
      css("[data-testid='dashboard'], .dashboard, main[aria-label*='Dashboard']"),
      xpath("//*[contains(@class,'dashboard') or @data-testid='dashboard' or contains(@aria-label,'Dashboard')]"),
    ],
    BALANCE_VALUE: [
      css("#account-balance .amount, [data-testid='account-balance-amount'], .balance-amount"),
      xpath("//*[@id='account-balance']//*[contains(@class,'amount') or @data-testid='account-balance-amount']"),
      xpath("//*[contains(@class,'balance')]//*[contains(@class,'amount') or contains(@class,'value')][1]"),
    ],
    NAV_TRANSFER: [
      css("a[href*='transfer'], a[data-testid='nav-transfer'], button[data-testid='nav-transfer']"),
      xpath("//a[contains(@href,'transfer') or contains(.,'Transfer')] | //button[contains(.,'Transfer')]"),
    ],
    TRANSFER_MARKER: [
      css("[data-testid='transfer-page'], .transfer-form, form[action*='transfer']"),
      xpath("//*[@data-testid='transfer-page' or contains(@class,'transfer-form') or self::form[contains(@action,'transfer')]]"),
    ],
    COOKIE_ACCEPT: [
      css("button[aria-label*='Accept'][aria-label*='cookies'], #onetrust-accept-btn-handler"),
      xpath("//button[contains(.,'Accept') and contains(.,'cookie')]"),
    ],
  },
}
