/** Text and amount cleanup shared by state reads and tool results. */

export function normText(s: string | null | undefined): string {
  return (s ?? '').normalize('NFKC').trim()
}

/**
 * Parse currency-like text: "$1,234.56" → 1234.56.
 *
 * Non-breaking and narrow no-break spaces are dropped, then everything but
 * digits, `.`, `,` and `-`. Commas are always treated as thousands
 * separators. Returns null for anything that is not a plain decimal number
 * afterwards; never throws.
 */
export function parseCurrency(text: string | null | undefined): number | null {
  if (!text) return null
  let t = text.replace(/\u00A0/g, '').replace(/\u202F/g, '')
  t = t.replace(/[^\d.,-]/g, '')
  const commas = (t.match(/,/g) ?? []).length
  if (commas > 1 && t.includes('.')) {
    t = t.replace(/,/g, '')
  }
  t = t.replace(/,/g, '')
  if (!/^-?(\d+\.?\d*|\.\d+)$/.test(t)) return null
  const n = Number(t)
  return Number.isFinite(n) ? n : null
}

/** Integral amounts keep one decimal place: 500 → "500.0". */
export function formatAmount(n: number): string {
  return Number.isInteger(n) ? n.toFixed(1) : String(n)
}

export function formatBool(b: boolean): 'True' | 'False' {
  return b ? 'True' : 'False'
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text
}
