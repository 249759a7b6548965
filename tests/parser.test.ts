import { ErrorCollector } from '../source/core/ErrorCollector'
import { Program, formatSyntaxTree } from '../source/intermediate/SyntaxTreeNode'
import { parseTokenSequence } from '../source/syntax_analyzer/SyntaxAnalyzer'
import { tokenizeSourceCode } from '../source/tokenizer/Tokenizer'

const parse = (source: string): { program: Program; errors: ErrorCollector } => {
  const errors = new ErrorCollector()
  const program = parseTokenSequence(tokenizeSourceCode(source, errors), errors)
  return { program, errors }
}

describe('SyntaxAnalyzer', () => {
  it('parses declarations, assignments and show statements', () => {
    const { program, errors } = parse('int x; x = 5 + 3; show x;')
    expect(errors.hasErrors()).toBe(false)
    expect(program.functions).toHaveLength(0)
    expect(program.statements).toHaveLength(3)
    expect(program.statements[0]).toMatchObject({ kind: 'DeclStmt', varType: 'int', name: 'x', initializer: null })
    expect(program.statements[1]).toMatchObject({
      kind: 'AssignStmt',
      name: 'x',
      value: {
        kind: 'BinaryOp',
        operator: '+',
        left: { kind: 'Literal', valueType: 'int', value: '5' },
        right: { kind: 'Literal', valueType: 'int', value: '3' },
      },
    })
    expect(program.statements[2]).toMatchObject({ kind: 'PrintStmt', expressions: [{ kind: 'Identifier', name: 'x' }] })
  })

  it('gives multiplication precedence over addition', () => {
    const { program } = parse('int r = a + b * -c;')
    expect(formatSyntaxTree(program)).toEqual([
      'Program',
      '  DeclStmt int r',
      '    BinaryOp +',
      '      Identifier a',
      '      BinaryOp *',
      '        Identifier b',
      '        UnaryOp -',
      '          Identifier c',
    ])
  })

  it('parses if, elif and else branches', () => {
    const { program, errors } = parse('if (x > 1 && y < 2) { show 1; } elif (x == 0) { show 2; } else { show 3; }')
    expect(errors.hasErrors()).toBe(false)
    const statement = program.statements[0]
    expect(statement.kind).toBe('IfStmt')
    if (statement.kind !== 'IfStmt') return
    expect(statement.branches).toHaveLength(2)
    expect(statement.branches[0].condition).toMatchObject({
      kind: 'BinaryOp',
      operator: '&&',
      left: { operator: '>' },
      right: { operator: '<' },
    })
    expect(statement.branches[1].condition).toMatchObject({ operator: '==' })
    expect(statement.elseBlock?.statements).toHaveLength(1)
  })

  it('uses a parenthesized expression as the left side of a comparison', () => {
    const { program, errors } = parse('if ((a + 1) > 2) { }')
    expect(errors.hasErrors()).toBe(false)
    const statement = program.statements[0]
    if (statement.kind !== 'IfStmt') throw new Error('expected IfStmt')
    expect(statement.branches[0].condition).toMatchObject({
      kind: 'BinaryOp',
      operator: '>',
      left: { kind: 'BinaryOp', operator: '+' },
      right: { kind: 'Literal', value: '2' },
    })
  })

  it('continues arithmetic after a parenthesized operand in a condition', () => {
    const { program, errors } = parse('if ((a + b) * 2 > 3) { } loop ((a) - 1 < b) { }')
    expect(errors.hasErrors()).toBe(false)
    const [ifStatement, loop] = program.statements
    if (ifStatement.kind !== 'IfStmt') throw new Error('expected IfStmt')
    expect(ifStatement.branches[0].condition).toMatchObject({
      kind: 'BinaryOp',
      operator: '>',
      left: { kind: 'BinaryOp', operator: '*', left: { kind: 'BinaryOp', operator: '+' }, right: { kind: 'Literal', value: '2' } },
      right: { kind: 'Literal', value: '3' },
    })
    expect(loop).toMatchObject({
      kind: 'ConditionalLoopStmt',
      condition: { operator: '<', left: { operator: '-', left: { kind: 'Identifier', name: 'a' } } },
    })
  })

  it('parses negated conditions', () => {
    const { program } = parse('loop (!(a == b)) { }')
    expect(program.statements[0]).toMatchObject({
      kind: 'ConditionalLoopStmt',
      condition: { kind: 'UnaryOp', operator: '!', operand: { kind: 'BinaryOp', operator: '==' } },
    })
  })

  it('parses both range loop forms', () => {
    const { program, errors } = parse('loop from i = 1 to 10 step 2 { show i; } loop from i to 3 { }')
    expect(errors.hasErrors()).toBe(false)
    expect(program.statements[0]).toMatchObject({
      kind: 'LoopStmt',
      variable: 'i',
      start: { value: '1' },
      end: { value: '10' },
      step: { value: '2' },
    })
    expect(program.statements[1]).toMatchObject({ kind: 'LoopStmt', variable: 'i', start: null, step: null })
  })

  it('parses function declarations before statements', () => {
    const { program, errors } = parse('func int add(int a, int b) { return a + b; } show add(2, 3);')
    expect(errors.hasErrors()).toBe(false)
    expect(program.functions[0]).toMatchObject({
      kind: 'FunctionDecl',
      returnType: 'int',
      name: 'add',
      params: [
        { type: 'int', name: 'a' },
        { type: 'int', name: 'b' },
      ],
    })
    expect(program.functions[0].body.statements[0]).toMatchObject({ kind: 'ReturnStmt', value: { operator: '+' } })
    expect(program.statements[0]).toMatchObject({
      kind: 'PrintStmt',
      expressions: [{ kind: 'FunctionCall', name: 'add', args: [{ value: '2' }, { value: '3' }] }],
    })
  })

  it('parses tell, bare return and call statements', () => {
    const { program, errors } = parse('func void f() { return; } int v; tell v; f();')
    expect(errors.hasErrors()).toBe(false)
    expect(program.functions[0].body.statements[0]).toMatchObject({ kind: 'ReturnStmt', value: null })
    expect(program.statements[1]).toMatchObject({ kind: 'InputStmt', name: 'v' })
    expect(program.statements[2]).toMatchObject({ kind: 'FunctionCall', name: 'f', args: [] })
  })

  it('assigns distinct node ids', () => {
    const { program } = parse('int a; int b;')
    const ids = [program.id, ...program.statements.map(statement => statement.id)]
    expect(new Set(ids).size).toBe(3)
  })

  it('recovers from a missing expression at the next semicolon', () => {
    const { program, errors } = parse('int x = ; show 1;')
    expect(errors.getErrors()).toHaveLength(1)
    expect(errors.getErrors()[0].message).toBe("期望表达式，实际为 ';'")
    expect(program.statements).toHaveLength(1)
    expect(program.statements[0].kind).toBe('PrintStmt')
  })

  it('keeps a statement whose semicolon is missing', () => {
    const { program, errors } = parse('show 1 show 2;')
    expect(errors.getErrors()).toHaveLength(1)
    expect(errors.getErrors()[0].message).toBe("期望 ';'，实际为 'show'")
    expect(program.statements).toHaveLength(2)
  })

  it('reports a function declared after statements', () => {
    const { errors } = parse('show 1; func int f() { return 1; }')
    expect(errors.getErrors().map(error => error.message)).toEqual(['函数声明必须位于所有语句之前', "多余的 '}'"])
  })

  it('reports an unmatched closing brace', () => {
    const { program, errors } = parse('show 1; } show 2;')
    expect(errors.getErrors().map(error => error.message)).toEqual(["多余的 '}'"])
    expect(program.statements).toHaveLength(2)
  })

  it('skips a function with a broken header', () => {
    const { program, errors } = parse('func int (int a) { return a; } show 1;')
    expect(errors.getErrors()[0].message).toBe("期望 IDENTIFIER，实际为 '('")
    expect(program.functions).toHaveLength(0)
    expect(program.statements).toHaveLength(1)
  })
})
