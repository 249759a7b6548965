/**
 * 文法定义文件解析器
 * 每行形如 “左部 → 右部 | 右部”，以“|”开头的续行为最近左部追加候选式
 */

import * as fs from 'fs'
import { CompilerError, requireCondition } from '../../core/utils'
import { Grammar, ProductionDefinition } from './Grammar'
import { SpecialGrammarSymbols } from './GrammarTypes'

const ARROWS = ['→', '->']
const ALTERNATIVE_SEPARATOR = '|'

/**
 * 文法定义文件解析器
 */
export class GrammarFileParser {
  private readonly _rawContent: string
  private _productionDefinitions: ProductionDefinition[] = [] // 定义的产生式（声明顺序）
  private _currentLhs: string | null = null // 最近声明的左部

  get productionDefinitions(): ProductionDefinition[] {
    return this._productionDefinitions
  }

  constructor(content: string) {
    this._rawContent = content.replace(/\r\n/g, '\n')
    this._parseLines()
  }

  /**
   * 从文件读入
   */
  static fromFile(filePath: string): GrammarFileParser {
    requireCondition(fs.existsSync(filePath), `找不到文法文件: ${filePath}`)
    return new GrammarFileParser(fs.readFileSync(filePath, 'utf-8'))
  }

  /**
   * 解析文本并构造拓广、编号后的文法
   */
  static parse(content: string): Grammar {
    return new GrammarFileParser(content).toGrammar()
  }

  toGrammar(): Grammar {
    return new Grammar(this._productionDefinitions)
  }

  private _parseLines(): void {
    this._rawContent.split('\n').forEach((rawLine, index) => {
      const line = rawLine.trim()
      const lineNumber = index + 1
      if (line.length === 0) return

      if (line.startsWith(ALTERNATIVE_SEPARATOR)) {
        if (this._currentLhs === null) {
          throw new CompilerError(`文法格式错误（第${lineNumber}行）：续行“|”之前没有声明任何左部`)
        }
        this._addAlternatives(this._currentLhs, line.slice(ALTERNATIVE_SEPARATOR.length), lineNumber)
        return
      }

      const arrow = findArrow(line)
      if (arrow === null) {
        throw new CompilerError(`文法格式错误（第${lineNumber}行）：缺少箭头“→”`)
      }
      const lhs = line.slice(0, arrow.index).trim()
      requireCondition(lhs.length > 0 && !/\s/.test(lhs), `文法格式错误（第${lineNumber}行）：左部必须是单个非终结符`)
      requireCondition(
        lhs !== SpecialGrammarSymbols.EPSILON && lhs !== SpecialGrammarSymbols.END,
        `文法格式错误（第${lineNumber}行）：${lhs} 不能作为左部`
      )
      this._currentLhs = lhs
      this._addAlternatives(lhs, line.slice(arrow.index + arrow.length), lineNumber)
    })
  }

  private _addAlternatives(lhs: string, text: string, lineNumber: number): void {
    for (const alternative of splitAlternatives(tokenizeRightHandSide(text, lineNumber))) {
      requireCondition(alternative.length > 0, `文法格式错误（第${lineNumber}行）：候选式为空，空产生式请写作 ${SpecialGrammarSymbols.EPSILON}`)
      const symbols = alternative.filter(symbol => symbol !== SpecialGrammarSymbols.EPSILON)
      const duplicated = this._productionDefinitions.some(
        definition => definition.lhs === lhs && definition.rhs.join(' ') === symbols.join(' ')
      )
      if (!duplicated) {
        this._productionDefinitions.push({ lhs, rhs: symbols })
      }
    }
  }
}

/**
 * 查找第一个箭头（左部中不会出现箭头）
 */
function findArrow(line: string): { index: number; length: number } | null {
  let found: { index: number; length: number } | null = null
  for (const arrow of ARROWS) {
    const index = line.indexOf(arrow)
    if (index !== -1 && (found === null || index < found.index)) {
      found = { index, length: arrow.length }
    }
  }
  return found
}

/**
 * 右部分词：以空白分隔，单引号括起的字面终结符整体作为一个符号（保留引号），
 * 引号外的“|”单独成为分隔记号
 */
export function tokenizeRightHandSide(text: string, lineNumber: number = 0): string[] {
  const tokens: string[] = []
  let current = ''
  let i = 0

  const flush = () => {
    if (current.length > 0) tokens.push(current)
    current = ''
  }

  while (i < text.length) {
    const ch = text[i]
    if (/\s/.test(ch)) {
      flush()
      i++
    } else if (ch === "'" && current.length === 0) {
      // 只有位于符号开头的引号才开启字面终结符，E' 之类的名字保持原样
      const close = text.indexOf("'", i + 1)
      requireCondition(close !== -1, `文法格式错误（第${lineNumber}行）：字面终结符缺少右引号`)
      requireCondition(close > i + 1, `文法格式错误（第${lineNumber}行）：字面终结符不能为空`)
      tokens.push(text.slice(i, close + 1))
      i = close + 1
    } else if (ch === ALTERNATIVE_SEPARATOR) {
      flush()
      tokens.push(ALTERNATIVE_SEPARATOR)
      i++
    } else {
      current += ch
      i++
    }
  }
  flush()
  return tokens
}

/**
 * 按分隔记号切分候选式
 */
function splitAlternatives(tokens: string[]): string[][] {
  const alternatives: string[][] = [[]]
  for (const token of tokens) {
    if (token === ALTERNATIVE_SEPARATOR) {
      alternatives.push([])
    } else {
      alternatives[alternatives.length - 1].push(token)
    }
  }
  return alternatives
}
