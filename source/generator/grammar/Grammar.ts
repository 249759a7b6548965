/**
 * 文法模型：编号后的产生式、终结符与非终结符集合、拓广开始符号
 */

import { compareStrings, requireCondition } from '../../core/utils'
import { Production, SpecialGrammarSymbols } from './GrammarTypes'

/**
 * 声明顺序下的一条产生式定义（编号前）
 */
export interface ProductionDefinition {
  lhs: string
  rhs: string[]
}

/**
 * 文法
 */
export class Grammar {
  private readonly _startSymbol: string
  private readonly _augmentedStartSymbol: string
  private readonly _productions: Production[] // 按编号排列
  private readonly _productionsOf: Map<string, Production[]> // 非终结符 -> 其产生式（声明顺序）
  private readonly _nonTerminals: string[] // 声明顺序，拓广开始符号在最前
  private readonly _terminals: string[] // 出现顺序，末尾为$

  get startSymbol(): string {
    return this._startSymbol
  }

  get augmentedStartSymbol(): string {
    return this._augmentedStartSymbol
  }

  get productions(): readonly Production[] {
    return this._productions
  }

  get nonTerminals(): readonly string[] {
    return this._nonTerminals
  }

  get terminals(): readonly string[] {
    return this._terminals
  }

  /**
   * @param definitions 按声明顺序排列的产生式，第一条的左部为开始符号
   */
  constructor(definitions: ProductionDefinition[]) {
    requireCondition(definitions.length > 0, '文法中没有任何产生式')

    const declared: string[] = []
    for (const definition of definitions) {
      if (!declared.includes(definition.lhs)) declared.push(definition.lhs)
    }
    this._startSymbol = declared[0]

    // 拓广开始符号不得与已有符号重名
    const referenced = new Set(definitions.flatMap(definition => definition.rhs))
    let augmented = this._startSymbol + SpecialGrammarSymbols.AUGMENT_MARK
    while (declared.includes(augmented) || referenced.has(augmented)) {
      augmented += SpecialGrammarSymbols.AUGMENT_MARK
    }
    this._augmentedStartSymbol = augmented
    this._nonTerminals = [augmented, ...declared]

    const terminals: string[] = []
    for (const definition of definitions) {
      for (const symbol of definition.rhs) {
        if (!declared.includes(symbol) && !terminals.includes(symbol)) terminals.push(symbol)
      }
    }
    requireCondition(!terminals.includes(SpecialGrammarSymbols.END), `符号 ${SpecialGrammarSymbols.END} 为保留的结束符`)
    terminals.push(SpecialGrammarSymbols.END)
    this._terminals = terminals

    // 0号为拓广产生式，其余按左部名字典序、同左部按声明顺序编号
    this._productions = [new Production(0, augmented, [this._startSymbol])]
    const ordered = [...declared].sort(compareStrings)
    for (const lhs of ordered) {
      for (const definition of definitions.filter(d => d.lhs === lhs)) {
        this._productions.push(new Production(this._productions.length, lhs, [...definition.rhs]))
      }
    }

    this._productionsOf = new Map()
    for (const production of this._productions) {
      const list = this._productionsOf.get(production.lhs) ?? []
      list.push(production)
      this._productionsOf.set(production.lhs, list)
    }
  }

  /**
   * 某个非终结符的全部产生式
   */
  productionsOf(nonTerminal: string): readonly Production[] {
    return this._productionsOf.get(nonTerminal) ?? []
  }

  isNonTerminal(symbol: string): boolean {
    return this._productionsOf.has(symbol)
  }

  isTerminal(symbol: string): boolean {
    return this._terminals.includes(symbol)
  }

  /**
   * 拓广产生式
   */
  get augmentedProduction(): Production {
    return this._productions[0]
  }
}
