/**
 * Token类型定义
 */

/**
 * 关键字Token名称
 */
export type KeywordTokenName =
  | 'INT'
  | 'FLOAT'
  | 'CHAR'
  | 'VOID'
  | 'IF'
  | 'ELIF'
  | 'ELSE'
  | 'LOOP'
  | 'FROM'
  | 'TO'
  | 'STEP'
  | 'SHOW'
  | 'TELL'
  | 'RETURN'
  | 'FUNC'

/**
 * 全部Token名称
 */
export type TokenName =
  | KeywordTokenName
  | 'IDENTIFIER'
  | 'INTEGER_LITERAL'
  | 'FLOAT_LITERAL'
  | 'CHAR_LITERAL'
  | 'PLUS'
  | 'MINUS'
  | 'MULTIPLY'
  | 'DIVIDE'
  | 'MODULO'
  | 'ASSIGN'
  | 'EQ'
  | 'NEQ'
  | 'LT'
  | 'GT'
  | 'LTE'
  | 'GTE'
  | 'AND'
  | 'OR'
  | 'NOT'
  | 'LPAREN'
  | 'RPAREN'
  | 'LBRACE'
  | 'RBRACE'
  | 'SEMICOLON'
  | 'COMMA'
  | 'EOF'

/**
 * Token类型
 */
export interface Token {
  /** Token名称 */
  name: TokenName
  /** Token的字面值（字符字面量不含引号） */
  literal: string
  /** 行号（从1开始） */
  lineNumber: number
  /** 在行中的位置（从1开始） */
  position: number
}
