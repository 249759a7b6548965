import * as path from 'path'
import { CompilerError } from '../source/core/utils'
import { GrammarFileParser, tokenizeRightHandSide } from '../source/generator/grammar/GrammarFileParser'

const SYNTAX_DIR = path.join(__dirname, '../syntax')

describe('GrammarFileParser', () => {
  it('numbers productions by left-hand side after the augmented one', () => {
    const grammar = GrammarFileParser.parse('T → id\nE → E + T | T')
    expect(grammar.startSymbol).toBe('T')
    expect(grammar.productions.map(production => production.toString())).toEqual([
      "T' → T",
      'E → E + T',
      'E → T',
      'T → id',
    ])
    expect(grammar.nonTerminals).toEqual(["T'", 'T', 'E'])
    expect(grammar.terminals).toEqual(['id', '+', '$'])
  })

  it('accepts the ascii arrow and continuation lines', () => {
    const grammar = GrammarFileParser.parse('S -> a S\n  | b\n\n')
    expect(grammar.productionsOf('S').map(production => production.rhs)).toEqual([['a', 'S'], ['b']])
  })

  it('keeps quoted terminals whole', () => {
    const grammar = GrammarFileParser.parse("S → 'a' S 'b' | '|' | ε")
    expect(grammar.productions.map(production => production.rhs)).toEqual([['S'], ["'a'", 'S', "'b'"], ["'|'"], []])
    expect(grammar.productions[3].isEpsilon).toBe(true)
    expect(grammar.productions[3].toString()).toBe('S → ε')
    expect(grammar.terminals).toEqual(["'a'", "'b'", "'|'", '$'])
  })

  it('treats a trailing quote as part of a name', () => {
    expect(tokenizeRightHandSide("T E' | ε")).toEqual(['T', "E'", '|', 'ε'])
  })

  it('picks an unused name for the augmented start symbol', () => {
    const grammar = GrammarFileParser.parse("E → T E'\nE' → + T E' | ε\nT → id")
    expect(grammar.augmentedStartSymbol).toBe("E''")
    expect(grammar.isNonTerminal("E'")).toBe(true)
  })

  it('drops duplicate alternatives', () => {
    expect(GrammarFileParser.parse('S → a | a\nS → a').productions).toHaveLength(2)
  })

  it('rejects a continuation line before any left-hand side', () => {
    expect(() => GrammarFileParser.parse('| a')).toThrow('文法格式错误（第1行）：续行“|”之前没有声明任何左部')
  })

  it('rejects malformed lines', () => {
    expect(() => GrammarFileParser.parse('S a b')).toThrow(CompilerError)
    expect(() => GrammarFileParser.parse('S → a |')).toThrow('候选式为空')
    expect(() => GrammarFileParser.parse('A B → c')).toThrow('左部必须是单个非终结符')
    expect(() => GrammarFileParser.parse("S → 'a")).toThrow('字面终结符缺少右引号')
    expect(() => GrammarFileParser.parse('S → a $')).toThrow(CompilerError)
  })

  it('loads the full language grammar', () => {
    const grammar = GrammarFileParser.fromFile(path.join(SYNTAX_DIR, 'toylang.grammar')).toGrammar()
    expect(grammar.startSymbol).toBe('Program')
    expect(grammar.augmentedStartSymbol).toBe("Program'")
    expect(grammar.isTerminal("'func'")).toBe(true)
    expect(grammar.isTerminal("'||'")).toBe(true)
    expect(grammar.isNonTerminal('Condition')).toBe(true)
  })

  it('reports a missing grammar file', () => {
    expect(() => GrammarFileParser.fromFile(path.join(SYNTAX_DIR, 'missing.grammar'))).toThrow('找不到文法文件')
  })
})
