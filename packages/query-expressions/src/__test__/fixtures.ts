/** Expression tables shared by the query expression tests. */

/** Valid expressions, already in canonical form. */
export const EXPRESSIONS = [
  'sample:aaaa',
  's:a',
  'sample:/samples/aaaa',
  'sample:https://localhost/samples/3',
  'sample:https://localhost:8080/samples/3',
  'not s:a',
  's:a or t:b',
  '*',
  '(*)',
  '* or sample:x',
  'not *',
  'sample:a',
  'sample:a and (group:b or group:c) and not group:d',
  'sample:a or (group:b and group:c) or not group:d',
  'sample:a or sample:b and sample:c or sample:d',
  'sample:a and sample:bbb or sample:c and sample:d',
  'sample:a and sample:b or not sample:c and sample:d',
  'sample:a and (group:b or group:x or group:yyyy or group:z) and not group:d',
  'not group:b or not group:c and (not sample:x and not sample:y) or sample:z',
  'not sample:https://localhost:8080/samples/3 or sample:https://localhost:8080/samples/2',
]

/** Indices of EXPRESSIONS that are a single clause. */
export const CLAUSE_INDICES = [0, 1, 2, 3, 4, 11]

/** Indices of EXPRESSIONS whose clause values are all one character long. */
export const SHORT_VALUE_INDICES = [1, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 16, 18]

/** Formatting variations and their canonical form. */
export const COMPOSED: [string, string][] = [
  ['sample : aaaa', 'sample:aaaa'],
  ['s :a', 's:a'],
  ['s: a', 's:a'],
  ['not s : a', 'not s:a'],
  [' *', '*'],
  ['* ', '*'],
  ['    *     ', '*'],
  ['  *     or    sample    :   x  ', '* or sample:x'],
  ['( sample : a )', '(sample:a)'],
  ['s:a or(s:b)', 's:a or (s:b)'],
]

export const INVALID = [
  '',
  '       ',
  'not',
  'sample in x',
  'sample in x, y, z',
  'sample',
  'in in in,in,in',
  ':',
  '::',
  'or : bla',
  '* ()',
  '()',
  '* : *',
  'x:()',
]

/** Expressions and their canonical form after adding one to every value. */
export const UPDATED: [string, string][] = [
  ['sample:3', 'sample:4'],
  ['not sample:4', 'not sample:5'],
  ['sample:3 or sample:4', 'sample:4 or sample:5'],
  ['sample:3 and sample:4', 'sample:4 and sample:5'],
  ['group:3', 'group:4'],
  ['not group:3', 'not group:4'],
  ['*', '*'],
  ['(*)', '(*)'],
  ['* or not *', '* or not *'],
  ['sample:4 and *', 'sample:5 and *'],
  ['sample:1 and (group:2 or sample:3) and not group:4', 'sample:2 and (group:3 or sample:4) and not group:5'],
  ['sample:1 or (sample:2 and sample:3) or not sample:4', 'sample:2 or (sample:3 and sample:4) or not sample:5'],
  ['sample:1 and sample:2 or sample:3 and sample:4', 'sample:2 and sample:3 or sample:4 and sample:5'],
  ['sample:1 and sample:2 or not sample:3 and sample:4', 'sample:2 and sample:3 or not sample:4 and sample:5'],
  ['sample:1 and (sample:2 or group:3) and not sample:6', 'sample:2 and (sample:3 or group:4) and not sample:7'],
  [
    'not group:1 or not group:2 and (not sample:4 and not sample:5) or sample:6',
    'not group:2 or not group:3 and (not sample:5 and not sample:6) or sample:7',
  ],
]

/** Run `fn` and return what it throws. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('Expected an error to be thrown')
}
