import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { GrammarAnalyzer } from '../source/generator/grammar/GrammarAnalyzer'
import { GrammarFileParser } from '../source/generator/grammar/GrammarFileParser'
import { generateGrammarReport } from '../source/generator/grammar/GrammarGenerator'

const SYNTAX_DIR = path.join(__dirname, '../syntax')
const minimal = GrammarFileParser.fromFile(path.join(SYNTAX_DIR, 'lr_minimal.grammar')).toGrammar()

describe('GrammarAnalyzer', () => {
  let outputDir: string

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined)
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'toylang-'))
  })

  afterEach(() => {
    jest.restoreAllMocks()
    fs.rmSync(outputDir, { recursive: true, force: true })
  })

  it('summarizes state and conflict counts', () => {
    const clr = new GrammarAnalyzer(minimal, 'clr1')
    const stateCount = clr.automaton?.stateCount
    expect(clr.summary()).toBe(`LR(1)：${stateCount} 个状态，${clr.conflictCount} 个冲突，不是 LR(1) 文法`)

    const simple = GrammarFileParser.fromFile(path.join(SYNTAX_DIR, 'll1_simple.grammar')).toGrammar()
    expect(new GrammarAnalyzer(simple, 'll1').summary()).toBe('LL(1)：1 个冲突，不是 LL(1) 文法')
    expect(new GrammarAnalyzer(simple, 'slr1').summary()).toMatch(/^SLR\(1\)：\d+ 个状态，0 个冲突，是 SLR\(1\) 文法$/)
  })

  it('renders conflict cells with every candidate', () => {
    const analyzer = new GrammarAnalyzer(minimal, 'lr0')
    const automaton = analyzer.automaton
    if (automaton === null) throw new Error('expected an LR(0) automaton')
    const identifierState = automaton.transition(0, 'IDENTIFIER')
    const callState = automaton.transition(identifierState ?? -1, '(')
    const report = analyzer.report()
    expect(report.actionTable[String(identifierState)]['(']).toBe(`r4 / s${callState}`)
    expect(report.states[0].items[0]).toBe("Program' → · Program")
    expect(report.belongsToClass).toBe(false)
    expect(report.canonicalStateCount).toBeNull()
  })

  it('keeps the canonical state count of a merged automaton', () => {
    const lalr = new GrammarAnalyzer(minimal, 'lalr1').report()
    const clr = new GrammarAnalyzer(minimal, 'clr1').report()
    const lr0 = new GrammarAnalyzer(minimal, 'lr0').report()
    expect(lalr.canonicalStateCount).toBe(clr.states.length)
    expect(lalr.states).toHaveLength(lr0.states.length)
    expect(lalr.productions[0]).toEqual({ index: 0, lhs: "Program'", rhs: ['Program'], text: "Program' → Program" })
  })

  it('renders LL(1) cells as production text', () => {
    const grammar = GrammarFileParser.fromFile(path.join(SYNTAX_DIR, 'll1_minimal.grammar')).toGrammar()
    const report = new GrammarAnalyzer(grammar, 'll1').report()
    expect(report.ll1Table.ExprBar['+']).toEqual(['ExprBar → + Factor ExprBar'])
    expect(report.ll1Table.ExprBar[';']).toEqual(['ExprBar → ε'])
    expect(report.nullable).toEqual(['ExprBar'])
    expect(report.states).toEqual([])
    expect(report.actionTable).toEqual({})
  })

  it('serializes the report with its description', () => {
    const target = path.join(outputDir, 'nested', 'report.json')
    new GrammarAnalyzer(minimal, 'slr1').serialize('test report', target)
    const written = JSON.parse(fs.readFileSync(target, 'utf-8'))
    expect(written.desc).toBe('test report')
    expect(written.grammarClass).toBe('slr1')
    expect(written.startSymbol).toBe('Program')
  })

  it('writes one report file per grammar class', () => {
    const grammarFile = path.join(SYNTAX_DIR, 'll1_simple.grammar')
    const analyzers = generateGrammarReport(grammarFile, ['ll1', 'slr1'], outputDir)
    expect(analyzers.map(analyzer => analyzer.belongsToClass)).toEqual([false, true])
    expect(fs.readdirSync(outputDir).sort()).toEqual(['ll1_simple-ll1.json', 'll1_simple-slr1.json'])
  })
})
