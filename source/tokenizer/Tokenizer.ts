/**
 * 词法分析器：单遍扫描源代码，生成带位置信息的Token序列
 */

import { ErrorCollector } from '../core/ErrorCollector'
import { isDigit, isLetter } from '../core/utils'
import { KeywordTokenName, Token, TokenName } from './Token'

/**
 * 关键字表
 */
export const KEYWORDS: ReadonlyMap<string, KeywordTokenName> = new Map<string, KeywordTokenName>([
  ['int', 'INT'],
  ['float', 'FLOAT'],
  ['char', 'CHAR'],
  ['void', 'VOID'],
  ['if', 'IF'],
  ['elif', 'ELIF'],
  ['else', 'ELSE'],
  ['loop', 'LOOP'],
  ['from', 'FROM'],
  ['to', 'TO'],
  ['step', 'STEP'],
  ['show', 'SHOW'],
  ['tell', 'TELL'],
  ['return', 'RETURN'],
  ['func', 'FUNC'],
])

// 双字符运算符优先于单字符运算符匹配；单独的 & 和 | 不是合法Token
const TWO_CHAR_OPERATORS: ReadonlyMap<string, TokenName> = new Map<string, TokenName>([
  ['==', 'EQ'],
  ['!=', 'NEQ'],
  ['<=', 'LTE'],
  ['>=', 'GTE'],
  ['&&', 'AND'],
  ['||', 'OR'],
])

const SINGLE_CHAR_OPERATORS: ReadonlyMap<string, TokenName> = new Map<string, TokenName>([
  ['+', 'PLUS'],
  ['-', 'MINUS'],
  ['*', 'MULTIPLY'],
  ['/', 'DIVIDE'],
  ['%', 'MODULO'],
  ['=', 'ASSIGN'],
  ['<', 'LT'],
  ['>', 'GT'],
  ['!', 'NOT'],
  ['(', 'LPAREN'],
  [')', 'RPAREN'],
  ['{', 'LBRACE'],
  ['}', 'RBRACE'],
  [';', 'SEMICOLON'],
  [',', 'COMMA'],
])

const WHITESPACE = ' \t\r\n'

function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_'
}

function isIdentifierPart(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch)
}

/**
 * 对源代码进行词法分析，返回以EOF结尾的Token序列
 * 遇到错误记录到错误收集器后继续扫描
 * @param sourceCode 源代码字符串
 * @param errorCollector 错误收集器
 */
export function tokenizeSourceCode(sourceCode: string, errorCollector: ErrorCollector): Token[] {
  // 标准化源代码：统一换行符
  const source = sourceCode.replace(/\r\n/g, '\n')

  const tokens: Token[] = []
  let index = 0 // 当前字符索引
  let lineNumber = 1 // 当前行号
  let column = 1 // 当前列号

  const current = (): string => (index < source.length ? source[index] : '')
  const peek = (): string => (index + 1 < source.length ? source[index + 1] : '')
  const advance = (): void => {
    if (source[index] === '\n') {
      lineNumber++
      column = 1
    } else {
      column++
    }
    index++
  }
  const push = (name: TokenName, literal: string, line: number, position: number): void => {
    tokens.push({ name, literal, lineNumber: line, position })
  }

  while (index < source.length) {
    const ch = current()
    const startLine = lineNumber
    const startColumn = column

    // 空白
    if (WHITESPACE.includes(ch)) {
      advance()
      continue
    }

    // 行注释
    if (ch === '/' && peek() === '/') {
      while (index < source.length && current() !== '\n') advance()
      continue
    }

    // 数字：至多一个小数点
    if (isDigit(ch)) {
      let literal = ''
      let hasDot = false
      while (isDigit(current()) || current() === '.') {
        if (current() === '.') {
          if (hasDot) {
            errorCollector.addLexicalError(`数字格式错误："${literal}." 含有多余的小数点`, lineNumber, column)
            break
          }
          hasDot = true
        }
        literal += current()
        advance()
      }
      push(hasDot ? 'FLOAT_LITERAL' : 'INTEGER_LITERAL', literal, startLine, startColumn)
      continue
    }

    // 标识符与关键字
    if (isIdentifierStart(ch)) {
      let literal = ''
      while (isIdentifierPart(current())) {
        literal += current()
        advance()
      }
      push(KEYWORDS.get(literal) ?? 'IDENTIFIER', literal, startLine, startColumn)
      continue
    }

    // 字符字面量：引号之间恰好一个字符
    if (ch === "'") {
      advance()
      if (index >= source.length || current() === '\n') {
        errorCollector.addLexicalError('字符字面量未闭合', startLine, startColumn)
        continue
      }
      if (current() === "'") {
        advance()
        errorCollector.addLexicalError('字符字面量不能为空', startLine, startColumn)
        continue
      }
      const value = current()
      advance()
      if (current() !== "'") {
        // 跳到同一行的右引号，避免剩余内容引发连锁错误
        const close = source.indexOf("'", index)
        const lineEnd = source.indexOf('\n', index)
        if (close !== -1 && (lineEnd === -1 || close < lineEnd)) {
          while (index <= close) advance()
          errorCollector.addLexicalError('字符字面量只能包含单个字符', startLine, startColumn)
        } else {
          errorCollector.addLexicalError('字符字面量未闭合', startLine, startColumn)
        }
        continue
      }
      advance()
      push('CHAR_LITERAL', value, startLine, startColumn)
      continue
    }

    // 运算符与界符
    const twoChars = ch + peek()
    const twoCharName = TWO_CHAR_OPERATORS.get(twoChars)
    if (twoCharName !== undefined) {
      advance()
      advance()
      push(twoCharName, twoChars, startLine, startColumn)
      continue
    }
    const singleCharName = SINGLE_CHAR_OPERATORS.get(ch)
    if (singleCharName !== undefined) {
      advance()
      push(singleCharName, ch, startLine, startColumn)
      continue
    }

    errorCollector.addLexicalError(`无法识别的字符："${ch}"`, startLine, startColumn)
    advance()
  }

  push('EOF', '', lineNumber, column)
  return tokens
}

/**
 * Token名称的可读形式，用于错误信息：运算符与关键字显示为源码写法
 */
export function describeTokenName(name: TokenName): string {
  for (const table of [TWO_CHAR_OPERATORS, SINGLE_CHAR_OPERATORS, KEYWORDS]) {
    for (const [text, tokenName] of table) {
      if (tokenName === name) return `'${text}'`
    }
  }
  return name === 'EOF' ? '文件结尾' : name
}

/**
 * Token的可读形式，用于错误信息
 */
export function describeToken(token: Token): string {
  return token.name === 'EOF' ? '文件结尾' : `'${token.literal}'`
}
