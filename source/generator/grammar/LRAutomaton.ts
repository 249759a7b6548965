/**
 * LR项目集规范族：闭包、转移与广度优先的自动机构造
 */

import { compareStrings } from '../../core/utils'
import { Grammar } from './Grammar'
import { SpecialGrammarSymbols } from './GrammarTypes'
import { LRItem, compareItems } from './LRItem'
import { GrammarSets, firstOfSequence } from './SetComputation'

/**
 * 项目种类：LR(0)项目不带向前看符号，LR(1)项目带一个
 */
export type ItemKind = 'lr0' | 'lr1'

/**
 * 自动机状态（不可变的项目集）
 */
export class LRState {
  private readonly _id: number
  private readonly _items: readonly LRItem[] // 按全序排列，无重复
  private readonly _key: string // 规范编码，项目集相同则相同

  get id(): number {
    return this._id
  }

  get items(): readonly LRItem[] {
    return this._items
  }

  get key(): string {
    return this._key
  }

  constructor(id: number, items: Iterable<LRItem>) {
    this._id = id
    this._items = normalizeItems(items)
    this._key = itemSetKey(this._items)
  }

  /**
   * 核心：去掉向前看符号后的项目集编码
   */
  get coreKey(): string {
    return itemSetKey(normalizeItems(this._items.map(item => item.toCore())))
  }
}

/**
 * 去重并排序
 */
export function normalizeItems(items: Iterable<LRItem>): LRItem[] {
  const unique = new Map<string, LRItem>()
  for (const item of items) {
    if (!unique.has(item.key)) unique.set(item.key, item)
  }
  return [...unique.values()].sort(compareItems)
}

/**
 * 项目集的规范编码（与项目顺序无关）
 */
export function itemSetKey(items: readonly LRItem[]): string {
  return normalizeItems(items)
    .map(item => item.key)
    .join('|')
}

/**
 * 闭包：点后为非终结符B时，加入B的全部产生式（点在最前）；
 * LR(1)项目的向前看符号取 FIRST(β·a)
 */
export function closure(items: Iterable<LRItem>, grammar: Grammar, sets: GrammarSets): LRItem[] {
  const result = new Map<string, LRItem>()
  const workList: LRItem[] = []
  for (const item of items) {
    if (!result.has(item.key)) {
      result.set(item.key, item)
      workList.push(item)
    }
  }

  while (workList.length > 0) {
    const item = workList.pop()
    if (item === undefined) break
    const next = item.nextSymbol
    if (next === null || !grammar.isNonTerminal(next)) continue

    const lookaheads: (string | null)[] =
      item.lookahead === null
        ? [null]
        : [...firstOfSequence([...item.remainderAfterNext, item.lookahead], sets.first, sets.nullable)].filter(
            symbol => symbol !== SpecialGrammarSymbols.EPSILON
          )

    for (const production of grammar.productionsOf(next)) {
      for (const lookahead of lookaheads) {
        const added = new LRItem(production, 0, lookahead)
        if (!result.has(added.key)) {
          result.set(added.key, added)
          workList.push(added)
        }
      }
    }
  }
  return normalizeItems(result.values())
}

/**
 * 转移：对点后为symbol的项目右移点再求闭包；没有项目可移动时返回null
 */
export function goto(items: readonly LRItem[], symbol: string, grammar: Grammar, sets: GrammarSets): LRItem[] | null {
  const kernel = items.filter(item => item.nextSymbol === symbol).map(item => item.advance())
  if (kernel.length === 0) return null
  return closure(kernel, grammar, sets)
}

/**
 * LR自动机：状态表与转移函数
 */
export class LRAutomaton {
  private readonly _kind: ItemKind
  private readonly _states: LRState[]
  private readonly _transitions: Map<number, Map<string, number>>

  get kind(): ItemKind {
    return this._kind
  }

  get states(): readonly LRState[] {
    return this._states
  }

  get stateCount(): number {
    return this._states.length
  }

  constructor(kind: ItemKind, states: LRState[], transitions: Map<number, Map<string, number>>) {
    this._kind = kind
    this._states = states
    this._transitions = transitions
  }

  /**
   * 广度优先构造：0号状态为拓广产生式初始项目的闭包，每个状态按符号排序依次求转移，
   * 项目集相同的状态只创建一次
   */
  static build(grammar: Grammar, sets: GrammarSets, kind: ItemKind): LRAutomaton {
    const startItem = new LRItem(grammar.augmentedProduction, 0, kind === 'lr1' ? SpecialGrammarSymbols.END : null)
    const states: LRState[] = [new LRState(0, closure([startItem], grammar, sets))]
    const stateIndex = new Map<string, number>([[states[0].key, 0]]) // 规范编码 -> 状态编号
    const transitions = new Map<number, Map<string, number>>()
    const queue: number[] = [0]

    while (queue.length > 0) {
      const current = queue.shift()
      if (current === undefined) break
      const state = states[current]

      const symbols = new Set<string>()
      for (const item of state.items) {
        if (item.nextSymbol !== null) symbols.add(item.nextSymbol)
      }

      for (const symbol of [...symbols].sort(compareStrings)) {
        const targetItems = goto(state.items, symbol, grammar, sets)
        if (targetItems === null) continue
        const key = itemSetKey(targetItems)
        let target = stateIndex.get(key)
        if (target === undefined) {
          target = states.length
          states.push(new LRState(target, targetItems))
          stateIndex.set(key, target)
          queue.push(target)
        }
        const edges = transitions.get(current) ?? new Map<string, number>()
        edges.set(symbol, target)
        transitions.set(current, edges)
      }
    }

    return new LRAutomaton(kind, states, transitions)
  }

  /**
   * 转移函数，无转移时返回undefined
   */
  transition(stateId: number, symbol: string): number | undefined {
    return this._transitions.get(stateId)?.get(symbol)
  }

  /**
   * 某状态的全部出边
   */
  transitionsFrom(stateId: number): ReadonlyMap<string, number> {
    return this._transitions.get(stateId) ?? new Map<string, number>()
  }

  /**
   * 全部转移边，按起点、符号排序
   */
  allTransitions(): { from: number; symbol: string; to: number }[] {
    const edges: { from: number; symbol: string; to: number }[] = []
    for (const state of this._states) {
      const outgoing = this.transitionsFrom(state.id)
      for (const symbol of [...outgoing.keys()].sort(compareStrings)) {
        const to = outgoing.get(symbol)
        if (to !== undefined) edges.push({ from: state.id, symbol, to })
      }
    }
    return edges
  }
}
