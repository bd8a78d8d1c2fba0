import { or } from '@optique/core/constructs'
import { command } from '@optique/core/primitives'
import { message } from '@optique/core/message'
import type { InferValue } from '@optique/core/parser'

import { formatCommand } from './commands/format.js'
import { checkCommand } from './commands/check.js'
import { whereCommand } from './commands/where.js'
import { sqlCommand } from './commands/sql.js'

// Main parser with all commands
export const parser = or(
  command('format', formatCommand, { description: message`Print the canonical form of an expression` }),
  command('check', checkCommand, { description: message`Validate an expression and report its shape` }),
  command('where', whereCommand, { description: message`Lower an expression to a WhereClause tree` }),
  command('sql', sqlCommand, { description: message`Compile an expression to a parameterised SQL predicate` }),
)

export type ParsedCommand = InferValue<typeof parser>
