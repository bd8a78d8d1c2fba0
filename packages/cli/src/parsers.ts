import { optional, multiple } from '@optique/core/modifiers'
import { option } from '@optique/core/primitives'
import { choice, integer, string } from '@optique/core/valueparser'
import type { ValueParser, ValueParserResult } from '@optique/core/valueparser'
import type { Suggestion } from '@optique/core/parser'
import { message } from '@optique/core/message'
import { isSymbol, SAMPLE_QUERY_FIELDS } from '@cohort/query-expressions'

// Expression argument, parsed by the command itself so --max-depth applies
export const expressionArg = string({ metavar: 'EXPRESSION' })

// Field list value parser (comma-separated)
export const fieldsArg: ValueParser<'sync', string[]> = {
  $mode: 'sync',
  metavar: 'FIELD[,FIELD...]',
  parse(input: string): ValueParserResult<string[]> {
    const fields = input.split(',').map(f => f.trim()).filter(f => f)
    if (fields.length === 0) {
      return { success: false, error: message`Field name cannot be empty` }
    }
    const invalid = fields.find(f => !isSymbol(f))
    if (invalid !== undefined) {
      return { success: false, error: message`Invalid field name: ${invalid}` }
    }
    return { success: true, value: fields }
  },
  format(value: string[]): string {
    return value.join(',')
  },
  *suggest(): Generator<Suggestion> {
    for (const field of SAMPLE_QUERY_FIELDS) {
      yield { kind: 'literal', text: field }
    }
  },
}

// A column, optionally qualified by its table
const SQL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)?$/

// Column mapping value parser - accepts field=column syntax
export const columnArg: ValueParser<'sync', { field: string; column: string }> = {
  $mode: 'sync',
  metavar: 'FIELD=COLUMN',
  parse(input: string): ValueParserResult<{ field: string; column: string }> {
    const eqIndex = input.indexOf('=')
    if (eqIndex === -1) {
      return { success: false, error: message`Column mapping must be in field=column format` }
    }
    const field = input.substring(0, eqIndex)
    const column = input.substring(eqIndex + 1)
    if (!isSymbol(field)) {
      return { success: false, error: message`Invalid field name: ${field}` }
    }
    if (!column) {
      return { success: false, error: message`Column cannot be empty` }
    }
    if (!SQL_IDENTIFIER.test(column)) {
      return { success: false, error: message`Invalid column name: ${column}` }
    }
    return { success: true, value: { field, column } }
  },
  format(value: { field: string; column: string }): string {
    return `${value.field}=${value.column}`
  },
}

// Output format choice
export const outputFormat = choice(['text', 'json'] as const)

// Common output option
export const outputOption = optional(option('-o', '--output', outputFormat, { description: message`Output format (text, json)` }))

// Allowed clause fields (repeatable, supports comma-separated values)
export const fieldsOption = multiple(option('--fields', fieldsArg, { description: message`Allowed clause fields (default: sample,group)` }))

// Nesting bound handed to the parser
export const maxDepthOption = optional(option('--max-depth', integer({ min: 1 }), { description: message`Maximum nesting depth` }))
