/**
 * Value coercion for clause values.
 *
 * Clause values are raw text. When lowering to a WhereClause they are
 * coerced to their natural type:
 *   "true" / "false"   → boolean
 *   decimal literals   → number, when the number prints back as the same text
 *   everything else    → string
 */

const DECIMAL = /^-?(?:0|[1-9]\d*)(?:\.\d+)?$/

export function coerceValue(raw: string): unknown {
  const lower = raw.toLowerCase()
  if (lower === 'true') return true
  if (lower === 'false') return false

  if (DECIMAL.test(raw)) {
    const num = Number(raw)
    // Rejects overflow, unsafe integers and non-canonical forms such as 1.50
    if (Number.isFinite(num) && String(num) === raw) return num
  }

  return raw
}
