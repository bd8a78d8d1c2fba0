/**
 * cohort-query entry point. Parses argv, runs one command and prints its
 * output; errors go to stderr with a non-zero exit code.
 */

import { message } from '@optique/core/message'
import { run } from '@optique/run'
import { Fmt } from '@cohort/core'

import { parser, type ParsedCommand } from './parser.js'
import { handleFormat } from './commands/format.js'
import { handleCheck } from './commands/check.js'
import { handleWhere } from './commands/where.js'
import { handleSql } from './commands/sql.js'
import { reportError } from './report.js'

function dispatch(result: ParsedCommand, fmt: Fmt): string {
  switch (result.cmd) {
    case 'format':
      return handleFormat(result)
    case 'check':
      return handleCheck(result, fmt)
    case 'where':
      return handleWhere(result)
    case 'sql':
      return handleSql(result)
  }
}

const result = run(parser, {
  programName: 'cohort-query',
  version: '0.1.0',
  description: message`Parse, check and compile sample/group query expressions`,
  help: 'both',
})

try {
  console.log(dispatch(result, Fmt.from(process.stdout.isTTY === true)))
} catch (err) {
  console.error(reportError(err, Fmt.from(process.stderr.isTTY === true)))
  process.exit(1)
}
