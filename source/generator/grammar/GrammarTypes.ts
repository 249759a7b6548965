/**
 * 文法分析相关的类型定义
 */

/**
 * 特殊文法符号
 */
export const SpecialGrammarSymbols = {
  END: '$', // 输入结束符
  EPSILON: 'ε', // 空串
  AUGMENT_MARK: "'", // 拓广开始符号后缀
} as const

/**
 * 被分析的文法类别
 */
export type GrammarClass = 'lr0' | 'slr1' | 'clr1' | 'lalr1' | 'll1'

export type LRGrammarClass = Exclude<GrammarClass, 'll1'>

export const ALL_GRAMMAR_CLASSES: readonly GrammarClass[] = ['lr0', 'slr1', 'clr1', 'lalr1', 'll1']

/**
 * 产生式（编号后不可变）
 */
export class Production {
  private readonly _index: number // 产生式编号，0号为拓广产生式
  private readonly _lhs: string // 左部非终结符
  private readonly _rhs: readonly string[] // 右部符号序列，空产生式为空数组

  get index(): number {
    return this._index
  }

  get lhs(): string {
    return this._lhs
  }

  get rhs(): readonly string[] {
    return this._rhs
  }

  get isEpsilon(): boolean {
    return this._rhs.length === 0
  }

  constructor(index: number, lhs: string, rhs: readonly string[]) {
    this._index = index
    this._lhs = lhs
    this._rhs = rhs
  }

  toString(): string {
    const body = this.isEpsilon ? SpecialGrammarSymbols.EPSILON : this._rhs.join(' ')
    return `${this._lhs} → ${body}`
  }
}

/**
 * ACTION表中的单个动作
 */
export type ParsingAction =
  | { type: 'shift'; data: number } // 目标状态
  | { type: 'reduce'; data: number } // 产生式编号
  | { type: 'acc' }

/**
 * ACTION表单元格，多个候选动作时为冲突标记
 */
export type ActionTableCell = ParsingAction | { type: 'conflict'; candidates: ParsingAction[] }

export type ConflictKind = 'shift-reduce' | 'reduce-reduce'

/**
 * LR分析表冲突记录
 */
export interface Conflict {
  state: number
  symbol: string
  kind: ConflictKind
  action1: string
  action2: string
}

/**
 * LL(1)分析表冲突记录
 */
export interface LL1Conflict {
  nonTerminal: string
  terminal: string
  production1: number
  production2: number
}

/**
 * 动作的文本形式：sN / rN / acc
 */
export function formatAction(action: ParsingAction): string {
  switch (action.type) {
    case 'shift':
      return `s${action.data}`
    case 'reduce':
      return `r${action.data}`
    case 'acc':
      return 'acc'
  }
}

/**
 * 单元格的文本形式，冲突单元格以“ / ”连接各候选动作
 */
export function formatActionCell(cell: ActionTableCell): string {
  if (cell.type === 'conflict') {
    return cell.candidates.map(formatAction).join(' / ')
  }
  return formatAction(cell)
}

const ACTION_ORDER: Record<ParsingAction['type'], number> = { acc: 0, reduce: 1, shift: 2 }

/**
 * 动作的全序：acc < 归约 < 移进，同类按编号
 */
export function compareActions(a: ParsingAction, b: ParsingAction): number {
  if (a.type !== b.type) return ACTION_ORDER[a.type] - ACTION_ORDER[b.type]
  const aData = a.type === 'acc' ? 0 : a.data
  const bData = b.type === 'acc' ? 0 : b.data
  return aData - bData
}
