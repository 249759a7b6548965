/**
 * ACTION/GOTO表构造与冲突检测
 * 各类文法只在归约动作的向前看范围上不同：
 *   LR(0) 全部终结符；SLR(1) FOLLOW(左部)；LR(1)/LALR(1) 项目自身的向前看符号
 */

import { requireCondition } from '../../core/utils'
import { Grammar } from './Grammar'
import {
  ActionTableCell,
  Conflict,
  LRGrammarClass,
  ParsingAction,
  SpecialGrammarSymbols,
  compareActions,
  formatAction,
} from './GrammarTypes'
import { LRAutomaton } from './LRAutomaton'
import { LRItem } from './LRItem'
import { GrammarSets } from './SetComputation'

/**
 * LR分析表
 */
export interface ParsingTable {
  policy: LRGrammarClass
  action: Map<number, Map<string, ActionTableCell>> // 状态 -> 终结符 -> 动作
  goto: Map<number, Map<string, number>> // 状态 -> 非终结符 -> 状态
  conflicts: Conflict[]
}

/**
 * 完成项目在给定策略下允许归约的终结符
 */
function reduceLookaheads(item: LRItem, grammar: Grammar, sets: GrammarSets, policy: LRGrammarClass): Iterable<string> {
  switch (policy) {
    case 'lr0':
      return grammar.terminals
    case 'slr1':
      return sets.follow.get(item.production.lhs) ?? []
    case 'clr1':
    case 'lalr1':
      requireCondition(item.lookahead !== null, `${policy} 分析表需要带向前看符号的LR(1)项目`)
      return [item.lookahead]
  }
}

/**
 * 遍历自动机全部状态构造分析表；多个候选动作时记录冲突并保留全部候选，不做任何优先级裁决
 */
export function buildParsingTable(
  automaton: LRAutomaton,
  grammar: Grammar,
  sets: GrammarSets,
  policy: LRGrammarClass
): ParsingTable {
  const action = new Map<number, Map<string, ActionTableCell>>()
  const gotoTable = new Map<number, Map<string, number>>()
  const conflicts: Conflict[] = []

  for (const state of automaton.states) {
    const candidates = new Map<string, Map<string, ParsingAction>>() // 终结符 -> 动作文本 -> 动作
    const propose = (symbol: string, proposed: ParsingAction) => {
      const list = candidates.get(symbol) ?? new Map<string, ParsingAction>()
      list.set(formatAction(proposed), proposed)
      candidates.set(symbol, list)
    }

    for (const item of state.items) {
      if (item.isComplete) {
        if (item.production.index === grammar.augmentedProduction.index) {
          propose(SpecialGrammarSymbols.END, { type: 'acc' })
        } else {
          for (const terminal of reduceLookaheads(item, grammar, sets, policy)) {
            propose(terminal, { type: 'reduce', data: item.production.index })
          }
        }
        continue
      }
      const next = item.nextSymbol
      if (next === null || !grammar.isTerminal(next)) continue
      const target = automaton.transition(state.id, next)
      if (target !== undefined) {
        propose(next, { type: 'shift', data: target })
      }
    }

    const row = new Map<string, ActionTableCell>()
    for (const terminal of grammar.terminals) {
      const proposed = candidates.get(terminal)
      if (proposed === undefined) continue
      const sorted = [...proposed.values()].sort(compareActions)
      if (sorted.length === 1) {
        row.set(terminal, sorted[0])
        continue
      }
      row.set(terminal, { type: 'conflict', candidates: sorted })
      conflicts.push({
        state: state.id,
        symbol: terminal,
        kind: sorted.every(candidate => candidate.type !== 'shift') ? 'reduce-reduce' : 'shift-reduce',
        action1: formatAction(sorted[0]),
        action2: formatAction(sorted[1]),
      })
    }
    action.set(state.id, row)

    const gotoRow = new Map<string, number>()
    for (const [symbol, target] of automaton.transitionsFrom(state.id)) {
      if (grammar.isNonTerminal(symbol)) gotoRow.set(symbol, target)
    }
    gotoTable.set(state.id, gotoRow)
  }

  return { policy, action, goto: gotoTable, conflicts }
}
