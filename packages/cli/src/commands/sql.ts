import { object } from '@optique/core/constructs'
import { multiple } from '@optique/core/modifiers'
import { argument, constant, option } from '@optique/core/primitives'
import { message } from '@optique/core/message'
import { coerceValue, SampleQuery, SqlCriterion, sqlCriterionAlgebra } from '@cohort/query-expressions'
import { ErrDuplicateColumn } from '../errors.js'
import { columnArg, expressionArg, maxDepthOption, outputOption } from '../parsers.js'

export const sqlCommand = object({
  cmd: constant('sql' as const),
  expression: argument(expressionArg, { description: message`Query expression to compile` }),
  columns: multiple(option('-c', '--column', columnArg, { description: message`Map a field to a column (field=column)` })),
  maxDepth: maxDepthOption,
  output: outputOption,
})

type ColumnMapping = { readonly field: string; readonly column: string }

function columnMap(mappings: readonly ColumnMapping[]): Map<string, string> {
  const columns = new Map<string, string>()
  for (const { field, column } of mappings) {
    const existing = columns.get(field)
    if (existing !== undefined && existing !== column) {
      throw ErrDuplicateColumn.create({ field, columns: [existing, column] })
    }
    columns.set(field, column)
  }
  return columns
}

/**
 * Compile the expression to a parameterised SQL predicate. Every clause
 * becomes `column = ?`; with column mappings only the mapped fields are
 * allowed, otherwise `sample` and `group` compare against columns of the
 * same name.
 */
export function handleSql(opts: {
  expression: string
  columns: readonly ColumnMapping[]
  maxDepth?: number
  output?: 'text' | 'json'
}): string {
  const columns = columnMap(opts.columns)
  const query = SampleQuery.parse(opts.expression, {
    fields: columns.size > 0 ? [...columns.keys()] : undefined,
    maxDepth: opts.maxDepth,
  })

  const criterion = query.criterion(
    (field, value) => SqlCriterion.compare(columns.get(field) ?? field, '=', coerceValue(value)),
    sqlCriterionAlgebra,
  )
  const { sql, params } = SqlCriterion.toSql(criterion)

  if (opts.output === 'json') return JSON.stringify({ sql, params })
  return params.length > 0 ? `${sql}\n-- params: ${JSON.stringify(params)}` : sql
}
