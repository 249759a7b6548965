/**
 * 文法分析器
 * 按文法类别构造集合、自动机与分析表，汇总为可导出的分析报告
 */

import * as fs from 'fs'
import * as path from 'path'
import { compareStrings, sortedValues } from '../../core/utils'
import { Grammar } from './Grammar'
import { Conflict, GrammarClass, LL1Conflict, formatActionCell } from './GrammarTypes'
import { mergeLALRStates } from './LALRMerger'
import { LL1Table, buildLL1Table } from './LL1TableBuilder'
import { LRAutomaton } from './LRAutomaton'
import { ParsingTable, buildParsingTable } from './ParsingTableBuilder'
import { GrammarSets, SymbolSetMap, computeGrammarSets } from './SetComputation'

export const GRAMMAR_CLASS_NAMES: Record<GrammarClass, string> = {
  lr0: 'LR(0)',
  slr1: 'SLR(1)',
  clr1: 'LR(1)',
  lalr1: 'LALR(1)',
  ll1: 'LL(1)',
}

/**
 * 分析报告（可直接序列化为JSON）
 */
export interface AnalysisReport {
  grammarClass: GrammarClass
  startSymbol: string
  augmentedStartSymbol: string
  terminals: string[]
  nonTerminals: string[]
  productions: { index: number; lhs: string; rhs: string[]; text: string }[]
  nullable: string[]
  first: Record<string, string[]>
  follow: Record<string, string[]>
  states: { id: number; items: string[] }[]
  transitions: { from: number; symbol: string; to: number }[]
  actionTable: Record<string, Record<string, string>>
  gotoTable: Record<string, Record<string, number>>
  conflicts: Conflict[]
  ll1Table: Record<string, Record<string, string[]>>
  ll1Conflicts: LL1Conflict[]
  canonicalStateCount: number | null // 仅LALR(1)：合并前的状态数
  diagnostics: string[]
  belongsToClass: boolean
}

function setMapToRecord(map: SymbolSetMap, keys: readonly string[]): Record<string, string[]> {
  const record: Record<string, string[]> = {}
  for (const key of keys) {
    record[key] = sortedValues(map.get(key) ?? [])
  }
  return record
}

/**
 * 文法分析器
 */
export class GrammarAnalyzer {
  private readonly _grammar: Grammar
  private readonly _grammarClass: GrammarClass
  private readonly _sets: GrammarSets
  private _automaton: LRAutomaton | null = null
  private _parsingTable: ParsingTable | null = null
  private _ll1Table: LL1Table | null = null
  private _canonicalStateCount: number | null = null

  get grammar(): Grammar {
    return this._grammar
  }

  get grammarClass(): GrammarClass {
    return this._grammarClass
  }

  get sets(): GrammarSets {
    return this._sets
  }

  get automaton(): LRAutomaton | null {
    return this._automaton
  }

  get parsingTable(): ParsingTable | null {
    return this._parsingTable
  }

  get ll1Table(): LL1Table | null {
    return this._ll1Table
  }

  get conflictCount(): number {
    return (this._parsingTable?.conflicts.length ?? 0) + (this._ll1Table?.conflicts.length ?? 0)
  }

  /**
   * 无冲突即属于该类文法
   */
  get belongsToClass(): boolean {
    return this.conflictCount === 0
  }

  constructor(grammar: Grammar, grammarClass: GrammarClass) {
    this._grammar = grammar
    this._grammarClass = grammarClass
    this._sets = computeGrammarSets(grammar)

    switch (grammarClass) {
      case 'lr0':
      case 'slr1':
        this._automaton = LRAutomaton.build(grammar, this._sets, 'lr0')
        this._parsingTable = buildParsingTable(this._automaton, grammar, this._sets, grammarClass)
        break
      case 'clr1':
        this._automaton = LRAutomaton.build(grammar, this._sets, 'lr1')
        this._parsingTable = buildParsingTable(this._automaton, grammar, this._sets, grammarClass)
        break
      case 'lalr1': {
        const canonical = LRAutomaton.build(grammar, this._sets, 'lr1')
        this._canonicalStateCount = canonical.stateCount
        this._automaton = mergeLALRStates(canonical).automaton
        this._parsingTable = buildParsingTable(this._automaton, grammar, this._sets, grammarClass)
        break
      }
      case 'll1':
        this._ll1Table = buildLL1Table(grammar, this._sets)
        break
    }
  }

  /**
   * 一行摘要
   */
  summary(): string {
    const name = GRAMMAR_CLASS_NAMES[this._grammarClass]
    const stateInfo = this._automaton === null ? '' : `${this._automaton.stateCount} 个状态，`
    const verdict = this.belongsToClass ? `是 ${name} 文法` : `不是 ${name} 文法`
    return `${name}：${stateInfo}${this.conflictCount} 个冲突，${verdict}`
  }

  /**
   * 汇总分析报告
   */
  report(): AnalysisReport {
    const grammar = this._grammar
    const actionTable: Record<string, Record<string, string>> = {}
    const gotoTable: Record<string, Record<string, number>> = {}
    if (this._parsingTable !== null) {
      for (const [state, row] of this._parsingTable.action) {
        const rendered: Record<string, string> = {}
        for (const [terminal, cell] of row) rendered[terminal] = formatActionCell(cell)
        actionTable[String(state)] = rendered
      }
      for (const [state, row] of this._parsingTable.goto) {
        const rendered: Record<string, number> = {}
        for (const symbol of [...row.keys()].sort(compareStrings)) {
          const target = row.get(symbol)
          if (target !== undefined) rendered[symbol] = target
        }
        gotoTable[String(state)] = rendered
      }
    }

    const ll1Table: Record<string, Record<string, string[]>> = {}
    if (this._ll1Table !== null) {
      for (const [nonTerminal, row] of this._ll1Table.table) {
        const rendered: Record<string, string[]> = {}
        for (const [terminal, productions] of row) {
          rendered[terminal] = productions.map(index => grammar.productions[index].toString())
        }
        ll1Table[nonTerminal] = rendered
      }
    }

    return {
      grammarClass: this._grammarClass,
      startSymbol: grammar.startSymbol,
      augmentedStartSymbol: grammar.augmentedStartSymbol,
      terminals: [...grammar.terminals],
      nonTerminals: [...grammar.nonTerminals],
      productions: grammar.productions.map(production => ({
        index: production.index,
        lhs: production.lhs,
        rhs: [...production.rhs],
        text: production.toString(),
      })),
      nullable: sortedValues(this._sets.nullable),
      first: setMapToRecord(this._sets.first, grammar.nonTerminals),
      follow: setMapToRecord(this._sets.follow, grammar.nonTerminals),
      states: (this._automaton?.states ?? []).map(state => ({
        id: state.id,
        items: state.items.map(item => item.toString()),
      })),
      transitions: this._automaton?.allTransitions() ?? [],
      actionTable,
      gotoTable,
      conflicts: this._parsingTable?.conflicts ?? [],
      ll1Table,
      ll1Conflicts: this._ll1Table?.conflicts ?? [],
      canonicalStateCount: this._canonicalStateCount,
      diagnostics: [...this._sets.diagnostics],
      belongsToClass: this.belongsToClass,
    }
  }

  /**
   * 序列化分析报告到JSON文件
   * @param description 描述信息
   * @param outputPath 输出文件路径
   */
  serialize(description: string, outputPath: string): void {
    console.log(`[GrammarAnalyzer] 开始序列化${GRAMMAR_CLASS_NAMES[this._grammarClass]}分析报告...`)
    const outputDir = path.dirname(outputPath)
    if (!fs.existsSync(outputDir)) {
      fs.mkdirSync(outputDir, { recursive: true })
    }
    fs.writeFileSync(outputPath, JSON.stringify({ desc: description, ...this.report() }, null, 2))
    console.log(`[GrammarAnalyzer] 分析报告已保存到: ${outputPath}`)
  }
}
