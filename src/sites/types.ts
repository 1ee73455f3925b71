import type { SelectorTable } from '../browser/selectors'

/** The irreversible page: every path marker AND the exact flow parameter. */
export interface CheckoutBoundary {
  pathMarkers: string[]
  param: string
  value: string
}

export interface CheckpointMarkers {
  captchaUrlMarkers: string[]
  signinUrlMarkers: string[]
}

export interface SiteProfile {
  name: string
  baseUrl: string
  selectors: SelectorTable
  /** Substrings of a lowercased URL that mean "this is a login page". */
  loginUrlMarkers: string[]
  checkout?: CheckoutBoundary
  checkpoint?: CheckpointMarkers
}
