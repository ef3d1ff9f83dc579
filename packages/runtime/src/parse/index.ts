/**
 * Declaration language parser.
 */

export * from './ast.ts'
export { LodeGrammar, match } from './grammar.ts'
export { type ParseResult, parse } from './parser.ts'
