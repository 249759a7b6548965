import * as path from 'path'
import { GrammarFileParser } from '../source/generator/grammar/GrammarFileParser'
import { computeGrammarSets, firstOfSequence } from '../source/generator/grammar/SetComputation'
import { sortedValues } from '../source/core/utils'

const grammar = GrammarFileParser.fromFile(path.join(__dirname, '../syntax/ll1_minimal.grammar')).toGrammar()
const sets = computeGrammarSets(grammar)
const firstOf = (symbol: string) => sortedValues(sets.first.get(symbol) ?? [])
const followOf = (symbol: string) => sortedValues(sets.follow.get(symbol) ?? [])

describe('computeGrammarSets', () => {
  it('finds nullable non-terminals', () => {
    expect(sortedValues(sets.nullable)).toEqual(['ExprBar'])
  })

  it('computes FIRST sets with ε for nullable symbols', () => {
    expect(firstOf('Factor')).toEqual(['(', 'id'])
    expect(firstOf('Expr')).toEqual(['(', 'id'])
    expect(firstOf('ExprBar')).toEqual(['+', 'ε'])
    expect(firstOf('call')).toEqual(['id'])
    expect(firstOf('+')).toEqual(['+'])
  })

  it('computes FOLLOW sets through nullable suffixes', () => {
    expect(followOf('Program')).toEqual(['$'])
    expect(followOf('Expr')).toEqual([')', ';', '=='])
    expect(followOf('ExprBar')).toEqual([')', ';', '=='])
    expect(followOf('Factor')).toEqual([')', '+', ';', '=='])
    expect(followOf('Cond')).toEqual([')', ';'])
    expect(sets.diagnostics).toEqual([])
  })

  it('computes FIRST of a symbol sequence', () => {
    expect(sortedValues(firstOfSequence(['ExprBar', ';'], sets.first, sets.nullable))).toEqual(['+', ';'])
    expect(sortedValues(firstOfSequence(['ExprBar'], sets.first, sets.nullable))).toEqual(['+', 'ε'])
    expect(sortedValues(firstOfSequence([], sets.first, sets.nullable))).toEqual(['ε'])
  })

  it('propagates nullability through chains', () => {
    const chain = computeGrammarSets(GrammarFileParser.parse('S → A B\nA → ε\nB → A'))
    expect(sortedValues(chain.nullable)).toEqual(['A', 'B', 'S', "S'"])
  })

  it('reports FOLLOW sets that do not converge within the limit', () => {
    const capped = computeGrammarSets(grammar, 1)
    expect(capped.diagnostics).toEqual(['FOLLOW集在 1 轮迭代后仍未收敛，结果可能不完整'])
  })
})
