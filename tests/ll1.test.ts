import * as path from 'path'
import { GrammarAnalyzer } from '../source/generator/grammar/GrammarAnalyzer'
import { GrammarFileParser } from '../source/generator/grammar/GrammarFileParser'
import { buildLL1Table } from '../source/generator/grammar/LL1TableBuilder'
import { computeGrammarSets } from '../source/generator/grammar/SetComputation'

const SYNTAX_DIR = path.join(__dirname, '../syntax')
const load = (name: string) => GrammarFileParser.fromFile(path.join(SYNTAX_DIR, name)).toGrammar()

describe('buildLL1Table', () => {
  const grammar = load('ll1_minimal.grammar')
  const { table, conflicts } = buildLL1Table(grammar, computeGrammarSets(grammar))

  it('fills ε-productions under FOLLOW of the left-hand side', () => {
    const row = table.get('ExprBar')
    expect(row?.get('+')).toEqual([4])
    expect(row?.get(';')).toEqual([5])
    expect(row?.get(')')).toEqual([5])
    expect(row?.get('==')).toEqual([5])
    expect(row?.has('id')).toBe(false)
  })

  it('leaves out the augmented start symbol', () => {
    expect(table.has(grammar.augmentedStartSymbol)).toBe(false)
    expect(table.has('Program')).toBe(true)
  })

  it('records every cell holding more than one production', () => {
    expect(conflicts).toEqual([
      { nonTerminal: 'Cond', terminal: '(', production1: 1, production2: 2 },
      { nonTerminal: 'Factor', terminal: 'id', production1: 6, production2: 7 },
      { nonTerminal: 'Stmt', terminal: 'id', production1: 10, production2: 11 },
      { nonTerminal: 'Stmt', terminal: '(', production1: 10, production2: 11 },
    ])
    expect(table.get('Factor')?.get('id')).toEqual([6, 7])
  })

  it('detects the common prefix of two alternatives', () => {
    const simple = load('ll1_simple.grammar')
    expect(buildLL1Table(simple, computeGrammarSets(simple)).conflicts).toEqual([
      { nonTerminal: 'F', terminal: 'id', production1: 2, production2: 3 },
    ])
  })

  it('accepts a left-factored expression grammar', () => {
    const clean = GrammarFileParser.parse("E → T E'\nE' → + T E' | ε\nT → id | ( E )")
    const analyzer = new GrammarAnalyzer(clean, 'll1')
    expect(clean.augmentedStartSymbol).toBe("E''")
    expect(analyzer.conflictCount).toBe(0)
    expect(analyzer.belongsToClass).toBe(true)
    expect(analyzer.automaton).toBeNull()
  })
})
