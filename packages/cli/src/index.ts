/**
 * @cohort/cli — commands of the cohort-query command line.
 */

export { formatCommand, handleFormat } from './commands/format.js'
export { checkCommand, handleCheck } from './commands/check.js'
export type { CheckReport } from './commands/check.js'
export { whereCommand, handleWhere } from './commands/where.js'
export { sqlCommand, handleSql } from './commands/sql.js'
export { CliBoundary, ErrDuplicateColumn } from './errors.js'
export { parser } from './parser.js'
export { reportError } from './report.js'
