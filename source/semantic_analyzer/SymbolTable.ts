/**
 * 符号表：作用域栈，查找由内向外进行
 */

import { DataType, ReturnType, TYPE_SIZES, VariableType } from '../intermediate/DataTypes'

/**
 * 函数签名
 */
export interface FunctionSignature {
  paramTypes: VariableType[]
  returnType: ReturnType
}

/**
 * 符号表项
 */
export interface SymbolEntry {
  name: string
  type: DataType // 变量的类型；函数为其返回类型
  scopeLevel: number // 声明所在作用域层次，全局为0
  line: number // 声明行号
  initialized: boolean
  offset: number // 存储偏移，函数为-1
  signature: FunctionSignature | null // 仅函数
}

/**
 * 函数签名的文本形式：name(int, float) -> int
 */
export function formatSignature(name: string, signature: FunctionSignature): string {
  return `${name}(${signature.paramTypes.join(', ')}) -> ${signature.returnType}`
}

export class SymbolTable {
  private _scopes: Map<string, SymbolEntry>[] = [new Map()] // 作用域栈，0号为全局
  private _history: SymbolEntry[] = [] // 所有曾声明过的表项（含已弹出作用域中的）
  private _nextOffset: number = 0 // 下一个变量的存储偏移
  private _currentFunction: SymbolEntry | null = null // 正在分析的函数

  get scopeLevel(): number {
    return this._scopes.length - 1
  }

  get history(): readonly SymbolEntry[] {
    return this._history
  }

  get currentFunction(): SymbolEntry | null {
    return this._currentFunction
  }

  set currentFunction(entry: SymbolEntry | null) {
    this._currentFunction = entry
  }

  enterScope(): void {
    this._scopes.push(new Map())
  }

  exitScope(): void {
    if (this._scopes.length > 1) {
      this._scopes.pop()
    }
  }

  /**
   * 在当前作用域声明变量；同一作用域已存在同名符号时返回已有表项，不做插入
   */
  declareVariable(name: string, type: VariableType, line: number, initialized: boolean): { entry: SymbolEntry; previous: SymbolEntry | null } {
    const previous = this.lookupCurrentScope(name)
    if (previous) return { entry: previous, previous }
    const entry: SymbolEntry = {
      name,
      type,
      scopeLevel: this.scopeLevel,
      line,
      initialized,
      offset: this._nextOffset,
      signature: null,
    }
    this._nextOffset += TYPE_SIZES[type]
    this.insert(entry)
    return { entry, previous: null }
  }

  /**
   * 在当前作用域声明函数；函数不占存储偏移
   */
  declareFunction(name: string, signature: FunctionSignature, line: number): { entry: SymbolEntry; previous: SymbolEntry | null } {
    const previous = this.lookupCurrentScope(name)
    if (previous) return { entry: previous, previous }
    const entry: SymbolEntry = {
      name,
      type: signature.returnType,
      scopeLevel: this.scopeLevel,
      line,
      initialized: true,
      offset: -1,
      signature,
    }
    this.insert(entry)
    return { entry, previous: null }
  }

  private insert(entry: SymbolEntry): void {
    this._scopes[this._scopes.length - 1].set(entry.name, entry)
    this._history.push(entry)
  }

  /**
   * 由内向外查找
   */
  lookup(name: string): SymbolEntry | null {
    for (let i = this._scopes.length - 1; i >= 0; i--) {
      const entry = this._scopes[i].get(name)
      if (entry) return entry
    }
    return null
  }

  /**
   * 只在当前作用域查找
   */
  lookupCurrentScope(name: string): SymbolEntry | null {
    return this._scopes[this._scopes.length - 1].get(name) ?? null
  }

  /**
   * 以表格文本输出全部历史表项
   */
  toTableString(): string {
    const lines = ['名称\t类型\t层次\t行号\t偏移\t已初始化']
    for (const entry of this._history) {
      const type = entry.signature ? formatSignature(entry.name, entry.signature) : entry.type
      const offset = entry.offset >= 0 ? String(entry.offset) : '-'
      lines.push([entry.name, type, entry.scopeLevel, entry.line, offset, entry.initialized ? '是' : '否'].join('\t'))
    }
    return lines.join('\n')
  }
}
