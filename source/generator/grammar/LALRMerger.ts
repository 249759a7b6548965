/**
 * LALR(1)状态合并：同心（核心相同）的LR(1)状态合并为一个状态，向前看符号取并集
 */

import { LRAutomaton, LRState } from './LRAutomaton'
import { LRItem } from './LRItem'
import { requireCondition } from '../../core/utils'

export interface LALRMergeResult {
  automaton: LRAutomaton
  stateMapping: number[] // 规范LR(1)状态编号 -> 合并后状态编号
}

/**
 * 合并后的编号按各核心在规范状态序列中首次出现的顺序分配；
 * 转移 (s, X) -> t 映射为 (merged(s), X) -> merged(t)
 */
export function mergeLALRStates(canonical: LRAutomaton): LALRMergeResult {
  requireCondition(canonical.kind === 'lr1', 'LALR合并需要规范LR(1)自动机')

  const coreIndex = new Map<string, number>() // 核心编码 -> 合并后编号
  const mergedItems: LRItem[][] = []
  const stateMapping: number[] = []

  for (const state of canonical.states) {
    const core = state.coreKey
    let merged = coreIndex.get(core)
    if (merged === undefined) {
      merged = mergedItems.length
      coreIndex.set(core, merged)
      mergedItems.push([])
    }
    mergedItems[merged].push(...state.items)
    stateMapping[state.id] = merged
  }

  const transitions = new Map<number, Map<string, number>>()
  for (const edge of canonical.allTransitions()) {
    const from = stateMapping[edge.from]
    const edges = transitions.get(from) ?? new Map<string, number>()
    if (!edges.has(edge.symbol)) {
      edges.set(edge.symbol, stateMapping[edge.to])
    }
    transitions.set(from, edges)
  }

  const states = mergedItems.map((items, id) => new LRState(id, items))
  return { automaton: new LRAutomaton('lr1', states, transitions), stateMapping }
}
