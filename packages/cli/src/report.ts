import { BadInput, CohortError, Fmt, HasExpression, HasPosition } from '@cohort/core'

/**
 * What the CLI prints for a failed command. Bad input gets a one-line
 * message, plus a caret under the offending position when the error has
 * one; anything else is a bug and is printed with its stack.
 */
export function reportError(err: unknown, fmt: Fmt): string {
  if (!CohortError.has(err, BadInput)) {
    return CohortError.wrap(err).prettyPrint(fmt, { includeStackTrace: true })
  }
  const lines = [`${fmt.red('error')}: ${err.message}`]
  if (CohortError.has(err, HasExpression) && CohortError.has(err, HasPosition)) {
    lines.push(`  ${err.data.expression}`, `  ${' '.repeat(err.data.index)}${fmt.red('^')}`)
  }
  return lines.join('\n')
}
