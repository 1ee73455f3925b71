/**
 * Candidate selector tables.
 *
 * A CandidateList is an ordered set of alternative locating strategies for
 * one semantic UI concern ("login submit button", "balance amount"). Order is
 * preference: the resolver stops at the first entry that matches anything.
 */

export type SelectorStrategy = 'css' | 'xpath'

export interface CandidateSelector {
  strategy: SelectorStrategy
  /** May contain `{name}` placeholders filled at resolution time. */
  pattern: string
}

export type CandidateList = readonly CandidateSelector[]

/** Concern name → candidates, e.g. `LOGIN_USERNAME`. */
export type SelectorTable = Readonly<Record<string, CandidateList>>

export type PatternParams = Readonly<Record<string, string | number>>

export function css(pattern: string): CandidateSelector {
  return { strategy: 'css', pattern }
}

export function xpath(pattern: string): CandidateSelector {
  return { strategy: 'xpath', pattern }
}

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g

export function placeholders(pattern: string): string[] {
  return Array.from(pattern.matchAll(PLACEHOLDER), (m) => m[1])
}

/**
 * Substitute `{name}` placeholders. When any placeholder has no value the
 * literal pattern comes back untouched; the query then simply finds nothing.
 */
export function fillPattern(pattern: string, params?: PatternParams): string {
  const names = placeholders(pattern)
  if (names.length === 0 || !params) return pattern
  if (names.some((n) => params[n] === undefined)) return pattern
  return pattern.replace(PLACEHOLDER, (_m, name: string) => String(params[name]))
}

/** Missing concerns resolve to an empty list, which never matches. */
export function candidates(table: SelectorTable, concern: string): CandidateList {
  return table[concern] ?? []
}

/**
 * Quote arbitrary text as an XPath string literal. XPath 1.0 has no escape
 * sequence, so text holding both quote kinds becomes a concat() call.
 */
export function xpathLiteral(text: string): string {
  if (!text.includes("'")) return `'${text}'`
  if (!text.includes('"')) return `"${text}"`
  return `concat('${text.split("'").join(`', "'", '`)}')`
}
