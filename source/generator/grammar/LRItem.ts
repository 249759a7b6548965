/**
 * LR项目：带点的产生式，LR(1)项目另带一个向前看终结符
 */

import { Production } from './GrammarTypes'

export class LRItem {
  private readonly _production: Production
  private readonly _dotPosition: number
  private readonly _lookahead: string | null // LR(0)/SLR项目为null

  get production(): Production {
    return this._production
  }

  get dotPosition(): number {
    return this._dotPosition
  }

  get lookahead(): string | null {
    return this._lookahead
  }

  constructor(production: Production, dotPosition: number = 0, lookahead: string | null = null) {
    this._production = production
    this._dotPosition = dotPosition
    this._lookahead = lookahead
  }

  /**
   * 点是否已到右部末尾
   */
  get isComplete(): boolean {
    return this._dotPosition >= this._production.rhs.length
  }

  /**
   * 点后的符号，完成项目返回null
   */
  get nextSymbol(): string | null {
    return this.isComplete ? null : this._production.rhs[this._dotPosition]
  }

  /**
   * 点后符号之后的剩余串
   */
  get remainderAfterNext(): readonly string[] {
    return this._production.rhs.slice(this._dotPosition + 1)
  }

  /**
   * 点右移一位，向前看符号不变
   */
  advance(): LRItem {
    return new LRItem(this._production, this._dotPosition + 1, this._lookahead)
  }

  /**
   * 去掉向前看符号后的核心项目
   */
  toCore(): LRItem {
    return this._lookahead === null ? this : new LRItem(this._production, this._dotPosition)
  }

  /**
   * 核心键（产生式编号+点位置）
   */
  get coreKey(): string {
    return `${this._production.index}.${this._dotPosition}`
  }

  /**
   * 完整键（含向前看符号），用于项目判等
   */
  get key(): string {
    return this._lookahead === null ? this.coreKey : `${this.coreKey}.${this._lookahead}`
  }

  toString(): string {
    const rhs = [...this._production.rhs]
    rhs.splice(this._dotPosition, 0, '·')
    const body = `${this._production.lhs} → ${rhs.join(' ')}`
    return this._lookahead === null ? body : `[${body}, ${this._lookahead}]`
  }
}

/**
 * 项目的全序：产生式编号、点位置、向前看符号
 */
export function compareItems(a: LRItem, b: LRItem): number {
  if (a.production.index !== b.production.index) return a.production.index - b.production.index
  if (a.dotPosition !== b.dotPosition) return a.dotPosition - b.dotPosition
  const la = a.lookahead ?? ''
  const lb = b.lookahead ?? ''
  if (la === lb) return 0
  return la < lb ? -1 : 1
}
