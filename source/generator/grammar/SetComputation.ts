/**
 * NULLABLE / FIRST / FOLLOW 集合计算（不动点迭代，集合只增不减）
 */

import { MAX_FOLLOW_ITERATIONS } from '../../core/utils'
import { Grammar } from './Grammar'
import { SpecialGrammarSymbols } from './GrammarTypes'

const { END, EPSILON } = SpecialGrammarSymbols

export type SymbolSetMap = Map<string, Set<string>>

export interface FollowResult {
  follow: SymbolSetMap
  converged: boolean
  iterations: number
}

/**
 * 一次文法分析所需的全部集合
 */
export interface GrammarSets {
  nullable: Set<string>
  first: SymbolSetMap
  follow: SymbolSetMap
  diagnostics: string[] // 非致命诊断信息（如FOLLOW未收敛）
}

/**
 * 可空非终结符：存在空产生式，或存在某产生式其右部全部为可空非终结符
 */
export function computeNullable(grammar: Grammar): Set<string> {
  const nullable = new Set<string>()
  let changed = true
  while (changed) {
    changed = false
    for (const production of grammar.productions) {
      if (nullable.has(production.lhs)) continue
      if (production.rhs.every(symbol => nullable.has(symbol))) {
        nullable.add(production.lhs)
        changed = true
      }
    }
  }
  return nullable
}

function addAll(target: Set<string>, source: Iterable<string>, except?: string): boolean {
  let grown = false
  for (const symbol of source) {
    if (symbol === except || target.has(symbol)) continue
    target.add(symbol)
    grown = true
  }
  return grown
}

/**
 * FIRST集：终结符映射到自身；可空非终结符的FIRST含ε
 */
export function computeFirst(grammar: Grammar, nullable: Set<string>): SymbolSetMap {
  const first: SymbolSetMap = new Map()
  for (const terminal of grammar.terminals) {
    first.set(terminal, new Set([terminal]))
  }
  for (const nonTerminal of grammar.nonTerminals) {
    first.set(nonTerminal, new Set())
  }

  let changed = true
  while (changed) {
    changed = false
    for (const production of grammar.productions) {
      const target = first.get(production.lhs) ?? new Set<string>()
      const sequenceFirst = firstOfSequence(production.rhs, first, nullable)
      if (addAll(target, sequenceFirst)) changed = true
    }
  }
  return first
}

/**
 * 符号串的FIRST集；串为空或全部可空时含ε
 */
export function firstOfSequence(symbols: readonly string[], first: SymbolSetMap, nullable: Set<string>): Set<string> {
  const result = new Set<string>()
  for (const symbol of symbols) {
    addAll(result, first.get(symbol) ?? [symbol], EPSILON)
    if (!nullable.has(symbol)) return result
  }
  result.add(EPSILON)
  return result
}

/**
 * FOLLOW集：开始符号（及拓广开始符号）总含$；迭代轮数有上限，超出时标记未收敛
 */
export function computeFollow(
  grammar: Grammar,
  first: SymbolSetMap,
  nullable: Set<string>,
  maxIterations: number = MAX_FOLLOW_ITERATIONS
): FollowResult {
  const follow: SymbolSetMap = new Map()
  for (const nonTerminal of grammar.nonTerminals) {
    follow.set(nonTerminal, new Set())
  }
  follow.get(grammar.augmentedStartSymbol)?.add(END)
  follow.get(grammar.startSymbol)?.add(END)

  let iterations = 0
  let converged = false
  while (iterations < maxIterations) {
    iterations++
    let changed = false
    for (const production of grammar.productions) {
      const lhsFollow = follow.get(production.lhs) ?? new Set<string>()
      production.rhs.forEach((symbol, position) => {
        const target = follow.get(symbol)
        if (target === undefined) return // 终结符
        const beta = production.rhs.slice(position + 1)
        const betaFirst = firstOfSequence(beta, first, nullable)
        if (addAll(target, betaFirst, EPSILON)) changed = true
        if (betaFirst.has(EPSILON) && addAll(target, lhsFollow)) changed = true
      })
    }
    if (!changed) {
      converged = true
      break
    }
  }
  return { follow, converged, iterations }
}

/**
 * 依次计算三种集合
 */
export function computeGrammarSets(grammar: Grammar, maxFollowIterations?: number): GrammarSets {
  const nullable = computeNullable(grammar)
  const first = computeFirst(grammar, nullable)
  const { follow, converged, iterations } = computeFollow(grammar, first, nullable, maxFollowIterations)
  const diagnostics: string[] = []
  if (!converged) {
    diagnostics.push(`FOLLOW集在 ${iterations} 轮迭代后仍未收敛，结果可能不完整`)
  }
  return { nullable, first, follow, diagnostics }
}
