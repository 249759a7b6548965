import { ErrorCollector } from '../source/core/ErrorCollector'
import { describeToken, describeTokenName, tokenizeSourceCode } from '../source/tokenizer/Tokenizer'

const lex = (source: string) => {
  const errors = new ErrorCollector()
  const tokens = tokenizeSourceCode(source, errors)
  return { tokens, errors }
}

describe('Tokenizer', () => {
  it('tokenizes declarations, assignments and show', () => {
    const { tokens, errors } = lex('int x; x = 5 + 3; show x;')
    expect(errors.hasErrors()).toBe(false)
    expect(tokens.map(token => token.name)).toEqual([
      'INT',
      'IDENTIFIER',
      'SEMICOLON',
      'IDENTIFIER',
      'ASSIGN',
      'INTEGER_LITERAL',
      'PLUS',
      'INTEGER_LITERAL',
      'SEMICOLON',
      'SHOW',
      'IDENTIFIER',
      'SEMICOLON',
      'EOF',
    ])
    expect(tokens[1]).toMatchObject({ literal: 'x', lineNumber: 1, position: 5 })
    expect(tokens[5]).toMatchObject({ literal: '5', position: 12 })
    expect(tokens[12]).toMatchObject({ name: 'EOF', literal: '', lineNumber: 1, position: 26 })
  })

  it('recognizes every keyword', () => {
    const { tokens } = lex('int float char void if elif else loop from to step show tell return func')
    expect(tokens.map(token => token.name)).toEqual([
      'INT',
      'FLOAT',
      'CHAR',
      'VOID',
      'IF',
      'ELIF',
      'ELSE',
      'LOOP',
      'FROM',
      'TO',
      'STEP',
      'SHOW',
      'TELL',
      'RETURN',
      'FUNC',
      'EOF',
    ])
  })

  it('prefers two-character operators', () => {
    const { tokens } = lex('a<=b != c && !d || e >= f == g')
    expect(tokens.filter(token => token.name !== 'IDENTIFIER').map(token => token.name)).toEqual([
      'LTE',
      'NEQ',
      'AND',
      'NOT',
      'OR',
      'GTE',
      'EQ',
      'EOF',
    ])
  })

  it('reads float and char literals', () => {
    const { tokens, errors } = lex("float f = 2.75; char c = 'z';")
    expect(errors.hasErrors()).toBe(false)
    expect(tokens[3]).toMatchObject({ name: 'FLOAT_LITERAL', literal: '2.75' })
    expect(tokens[8]).toMatchObject({ name: 'CHAR_LITERAL', literal: 'z', position: 26 })
  })

  it('skips line comments and tracks lines', () => {
    const { tokens } = lex('int a; // 注释\n  show a;')
    expect(tokens.map(token => token.name)).toEqual(['INT', 'IDENTIFIER', 'SEMICOLON', 'SHOW', 'IDENTIFIER', 'SEMICOLON', 'EOF'])
    expect(tokens[3]).toMatchObject({ lineNumber: 2, position: 3 })
  })

  it('reports a number with two decimal points', () => {
    const { tokens, errors } = lex('float f = 1.2.3;')
    expect(errors.getErrors()[0].message).toBe('数字格式错误："1.2." 含有多余的小数点')
    expect(errors.getErrors()[0]).toMatchObject({ lineNumber: 1, position: 14 })
    expect(tokens[3]).toMatchObject({ name: 'FLOAT_LITERAL', literal: '1.2' })
  })

  it('reports malformed char literals', () => {
    expect(lex("char c = 'ab';").errors.getErrors()[0].message).toBe('字符字面量只能包含单个字符')
    expect(lex("char c = '';").errors.getErrors()[0].message).toBe('字符字面量不能为空')
    expect(lex("char c = 'a").errors.getErrors()[0].message).toBe('字符字面量未闭合')
  })

  it('continues after an unknown character', () => {
    const { tokens, errors } = lex('int @x;')
    expect(errors.getErrors()).toHaveLength(1)
    expect(errors.getErrors()[0]).toMatchObject({ message: '无法识别的字符："@"', lineNumber: 1, position: 5 })
    expect(tokens.map(token => token.name)).toEqual(['INT', 'IDENTIFIER', 'SEMICOLON', 'EOF'])
  })

  it('describes tokens for diagnostics', () => {
    expect(describeTokenName('SEMICOLON')).toBe("';'")
    expect(describeTokenName('RETURN')).toBe("'return'")
    expect(describeTokenName('IDENTIFIER')).toBe('IDENTIFIER')
    expect(describeTokenName('EOF')).toBe('文件结尾')
    expect(describeToken({ name: 'IDENTIFIER', literal: 'abc', lineNumber: 1, position: 1 })).toBe("'abc'")
  })
})
