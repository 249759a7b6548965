/**
 * LL(1)预测分析表构造
 */

import { Grammar } from './Grammar'
import { LL1Conflict, SpecialGrammarSymbols } from './GrammarTypes'
import { GrammarSets, firstOfSequence } from './SetComputation'

export interface LL1Table {
  table: Map<string, Map<string, number[]>> // 非终结符 -> 终结符 -> 产生式编号（多于一个即冲突）
  conflicts: LL1Conflict[]
}

/**
 * 对每条产生式 A → α：FIRST(α) 中每个终结符填入该产生式；α可空时 FOLLOW(A) 中每个终结符也填入。
 * 拓广产生式不参与。
 */
export function buildLL1Table(grammar: Grammar, sets: GrammarSets): LL1Table {
  const table = new Map<string, Map<string, number[]>>()
  const conflicts: LL1Conflict[] = []

  for (const nonTerminal of grammar.nonTerminals) {
    if (nonTerminal === grammar.augmentedStartSymbol) continue
    table.set(nonTerminal, new Map())
  }

  for (const production of grammar.productions) {
    const row = table.get(production.lhs)
    if (row === undefined) continue

    const entries = new Set<string>()
    const first = firstOfSequence(production.rhs, sets.first, sets.nullable)
    for (const terminal of first) {
      if (terminal !== SpecialGrammarSymbols.EPSILON) entries.add(terminal)
    }
    if (first.has(SpecialGrammarSymbols.EPSILON)) {
      for (const terminal of sets.follow.get(production.lhs) ?? []) entries.add(terminal)
    }

    for (const terminal of grammar.terminals) {
      if (!entries.has(terminal)) continue
      const cell = row.get(terminal) ?? []
      if (cell.length > 0 && !cell.includes(production.index)) {
        conflicts.push({
          nonTerminal: production.lhs,
          terminal,
          production1: cell[0],
          production2: production.index,
        })
      }
      if (!cell.includes(production.index)) cell.push(production.index)
      row.set(terminal, cell)
    }
  }

  return { table, conflicts }
}
