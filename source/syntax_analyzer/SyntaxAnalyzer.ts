/**
 * 语法分析器：递归下降分析Token序列，构造抽象语法树
 * 每个非终结符对应一个分析方法，产生式选择至多向前看一个Token
 */

import { ErrorCollector } from '../core/ErrorCollector'
import { requireCondition } from '../core/utils'
import { ReturnType, VariableType } from '../intermediate/DataTypes'
import {
  AssignStmt,
  BinaryOperator,
  Block,
  ConditionalBranch,
  ConditionalLoopStmt,
  DeclStmt,
  Expression,
  FunctionCall,
  FunctionDecl,
  IfStmt,
  InputStmt,
  LoopStmt,
  Parameter,
  PrintStmt,
  Program,
  ReturnStmt,
  Statement,
} from '../intermediate/SyntaxTreeNode'
import { Token, TokenName } from '../tokenizer/Token'
import { describeToken, describeTokenName } from '../tokenizer/Tokenizer'

const VARIABLE_TYPE_TOKENS: ReadonlyMap<TokenName, VariableType> = new Map<TokenName, VariableType>([
  ['INT', 'int'],
  ['FLOAT', 'float'],
  ['CHAR', 'char'],
])

const RELATIONAL_OPERATORS: ReadonlyMap<TokenName, BinaryOperator> = new Map<TokenName, BinaryOperator>([
  ['EQ', '=='],
  ['NEQ', '!='],
  ['LT', '<'],
  ['GT', '>'],
  ['LTE', '<='],
  ['GTE', '>='],
])

const ADDITIVE_OPERATORS: ReadonlyMap<TokenName, BinaryOperator> = new Map<TokenName, BinaryOperator>([
  ['PLUS', '+'],
  ['MINUS', '-'],
])

const MULTIPLICATIVE_OPERATORS: ReadonlyMap<TokenName, BinaryOperator> = new Map<TokenName, BinaryOperator>([
  ['MULTIPLY', '*'],
  ['DIVIDE', '/'],
  ['MODULO', '%'],
])

/**
 * 递归下降语法分析器
 * 分析方法出错时记录语法错误并返回null，由语句列表负责同步恢复
 */
export class SyntaxAnalyzer {
  private readonly _tokens: Token[]
  private readonly _errorCollector: ErrorCollector
  private _position: number = 0 // 当前Token下标
  private _nodeCounter: number = 0 // 节点编号计数

  constructor(tokens: Token[], errorCollector: ErrorCollector) {
    requireCondition(tokens.length > 0 && tokens[tokens.length - 1].name === 'EOF', 'Token序列必须以EOF结尾')
    this._tokens = tokens
    this._errorCollector = errorCollector
  }

  /**
   * Program := FunctionDecl* Stmt*
   */
  parseProgram(): Program {
    const line = this.current().lineNumber
    const functions: FunctionDecl[] = []
    while (this.check('FUNC')) {
      const func = this.parseFunctionDecl()
      if (func) {
        functions.push(func)
      } else {
        this.synchronizeFunction()
      }
    }

    const statements = this.parseStatementList()
    while (!this.check('EOF')) {
      this.error(`多余的 ${describeToken(this.current())}`)
      this.advance()
      statements.push(...this.parseStatementList())
    }
    return { kind: 'Program', id: this.nextNodeId(), line, functions, statements }
  }

  // ---------------- Token操作 ----------------

  private current(): Token {
    return this._tokens[this._position]
  }

  private peek(offset: number = 1): Token {
    return this._tokens[Math.min(this._position + offset, this._tokens.length - 1)]
  }

  private advance(): Token {
    const token = this.current()
    if (token.name !== 'EOF') this._position++
    return token
  }

  private check(name: TokenName): boolean {
    return this.current().name === name
  }

  private match(name: TokenName): boolean {
    if (!this.check(name)) return false
    this.advance()
    return true
  }

  /**
   * 当前Token必须为name，否则记录语法错误并返回null（不消耗Token）
   */
  private expect(name: TokenName): Token | null {
    if (this.check(name)) return this.advance()
    this.error(`期望 ${describeTokenName(name)}，实际为 ${describeToken(this.current())}`)
    return null
  }

  /**
   * 语句末尾的分号缺失只记录错误，语句本身保留
   */
  private expectSemicolon(): void {
    this.expect('SEMICOLON')
  }

  private error(message: string): void {
    const token = this.current()
    this._errorCollector.addSyntaxError(message, token.lineNumber, token.position)
  }

  private nextNodeId(): number {
    return this._nodeCounter++
  }

  /**
   * 跳过Token直到分号、右花括号或文件结尾，并吃掉分号
   */
  private synchronize(): void {
    while (!this.check('SEMICOLON') && !this.check('RBRACE') && !this.check('EOF')) {
      this.advance()
    }
    this.match('SEMICOLON')
  }

  /**
   * 函数声明出错时跳到右花括号之后
   */
  private synchronizeFunction(): void {
    while (!this.check('RBRACE') && !this.check('EOF')) {
      this.advance()
    }
    this.match('RBRACE')
  }

  // ---------------- 函数与语句 ----------------

  /**
   * FunctionDecl := 'func' Type IDENTIFIER '(' [Param (',' Param)*] ')' Block
   */
  private parseFunctionDecl(): FunctionDecl | null {
    const funcToken = this.advance()
    const typeToken = this.current()
    let returnType: ReturnType
    const variableType = VARIABLE_TYPE_TOKENS.get(typeToken.name)
    if (variableType !== undefined) {
      returnType = variableType
    } else if (typeToken.name === 'VOID') {
      returnType = 'void'
    } else {
      this.error(`期望函数返回类型，实际为 ${describeToken(typeToken)}`)
      return null
    }
    this.advance()

    const nameToken = this.expect('IDENTIFIER')
    if (!nameToken || !this.expect('LPAREN')) return null

    const params: Parameter[] = []
    if (!this.check('RPAREN')) {
      do {
        const paramType = VARIABLE_TYPE_TOKENS.get(this.current().name)
        if (paramType === undefined) {
          this.error(`期望参数类型，实际为 ${describeToken(this.current())}`)
          return null
        }
        const typeTokenLine = this.advance().lineNumber
        const paramName = this.expect('IDENTIFIER')
        if (!paramName) return null
        params.push({ type: paramType, name: paramName.literal, line: typeTokenLine })
      } while (this.match('COMMA'))
    }
    if (!this.expect('RPAREN')) return null

    const body = this.parseBlock()
    if (!body) return null
    return {
      kind: 'FunctionDecl',
      id: this.nextNodeId(),
      line: funcToken.lineNumber,
      returnType,
      name: nameToken.literal,
      params,
      body,
    }
  }

  /**
   * 语句列表，遇到右花括号或文件结尾停止；出错的语句经同步后跳过
   */
  private parseStatementList(): Statement[] {
    const statements: Statement[] = []
    while (!this.check('EOF') && !this.check('RBRACE')) {
      const statement = this.parseStatement()
      if (statement) {
        statements.push(statement)
      } else {
        this.synchronize()
      }
    }
    return statements
  }

  private parseStatement(): Statement | null {
    const token = this.current()
    switch (token.name) {
      case 'INT':
      case 'FLOAT':
      case 'CHAR':
        return this.parseDeclaration()
      case 'IDENTIFIER':
        return this.peek().name === 'LPAREN' ? this.parseCallStatement() : this.parseAssignment()
      case 'IF':
        return this.parseIf()
      case 'LOOP':
        return this.parseLoop()
      case 'SHOW':
        return this.parsePrint()
      case 'TELL':
        return this.parseInput()
      case 'RETURN':
        return this.parseReturn()
      case 'LBRACE':
        return this.parseBlock()
      case 'FUNC':
        this.error('函数声明必须位于所有语句之前')
        return null
      default:
        this.error(`意外的 ${describeToken(token)}`)
        return null
    }
  }

  /**
   * DeclStmt := Type IDENTIFIER ['=' Expr] ';'
   */
  private parseDeclaration(): DeclStmt | null {
    const typeToken = this.advance()
    const varType = VARIABLE_TYPE_TOKENS.get(typeToken.name)
    requireCondition(varType !== undefined, `不是变量类型: ${typeToken.name}`)
    const nameToken = this.expect('IDENTIFIER')
    if (!nameToken) return null

    let initializer: Expression | null = null
    if (this.match('ASSIGN')) {
      initializer = this.parseExpression()
      if (!initializer) return null
    }
    this.expectSemicolon()
    return {
      kind: 'DeclStmt',
      id: this.nextNodeId(),
      line: typeToken.lineNumber,
      varType,
      name: nameToken.literal,
      initializer,
    }
  }

  /**
   * AssignStmt := IDENTIFIER '=' Expr ';'
   */
  private parseAssignment(): AssignStmt | null {
    const nameToken = this.advance()
    if (!this.expect('ASSIGN')) return null
    const value = this.parseExpression()
    if (!value) return null
    this.expectSemicolon()
    return { kind: 'AssignStmt', id: this.nextNodeId(), line: nameToken.lineNumber, name: nameToken.literal, value }
  }

  private parseCallStatement(): FunctionCall | null {
    const call = this.parseFunctionCall()
    if (!call) return null
    this.expectSemicolon()
    return call
  }

  /**
   * 'if' '(' Cond ')' Block ('elif' '(' Cond ')' Block)* ['else' Block]
   */
  private parseIf(): IfStmt | null {
    const ifToken = this.advance()
    const branches: ConditionalBranch[] = []

    const first = this.parseConditionalBranch()
    if (!first) return null
    branches.push(first)

    while (this.check('ELIF')) {
      this.advance()
      const branch = this.parseConditionalBranch()
      if (!branch) return null
      branches.push(branch)
    }

    let elseBlock: Block | null = null
    if (this.match('ELSE')) {
      elseBlock = this.parseBlock()
      if (!elseBlock) return null
    }
    return { kind: 'IfStmt', id: this.nextNodeId(), line: ifToken.lineNumber, branches, elseBlock }
  }

  private parseConditionalBranch(): ConditionalBranch | null {
    if (!this.expect('LPAREN')) return null
    const condition = this.parseCondition()
    if (!condition || !this.expect('RPAREN')) return null
    const body = this.parseBlock()
    if (!body) return null
    return { condition, body }
  }

  /**
   * 'loop' '(' Cond ')' Block
   * 'loop' 'from' IDENTIFIER ['=' Expr] 'to' Expr ['step' Expr] Block
   */
  private parseLoop(): LoopStmt | ConditionalLoopStmt | null {
    const loopToken = this.advance()

    if (this.match('LPAREN')) {
      const condition = this.parseCondition()
      if (!condition || !this.expect('RPAREN')) return null
      const body = this.parseBlock()
      if (!body) return null
      return { kind: 'ConditionalLoopStmt', id: this.nextNodeId(), line: loopToken.lineNumber, condition, body }
    }

    if (!this.expect('FROM')) return null
    const variableToken = this.expect('IDENTIFIER')
    if (!variableToken) return null

    let start: Expression | null = null
    if (this.match('ASSIGN')) {
      start = this.parseExpression()
      if (!start) return null
    }
    if (!this.expect('TO')) return null
    const end = this.parseExpression()
    if (!end) return null

    let step: Expression | null = null
    if (this.match('STEP')) {
      step = this.parseExpression()
      if (!step) return null
    }
    const body = this.parseBlock()
    if (!body) return null
    return {
      kind: 'LoopStmt',
      id: this.nextNodeId(),
      line: loopToken.lineNumber,
      variable: variableToken.literal,
      start,
      end,
      step,
      body,
    }
  }

  /**
   * 'show' Expr (',' Expr)* ';'
   */
  private parsePrint(): PrintStmt | null {
    const showToken = this.advance()
    const expressions: Expression[] = []
    do {
      const expression = this.parseExpression()
      if (!expression) return null
      expressions.push(expression)
    } while (this.match('COMMA'))
    this.expectSemicolon()
    return { kind: 'PrintStmt', id: this.nextNodeId(), line: showToken.lineNumber, expressions }
  }

  /**
   * 'tell' IDENTIFIER ';'
   */
  private parseInput(): InputStmt | null {
    const tellToken = this.advance()
    const nameToken = this.expect('IDENTIFIER')
    if (!nameToken) return null
    this.expectSemicolon()
    return { kind: 'InputStmt', id: this.nextNodeId(), line: tellToken.lineNumber, name: nameToken.literal }
  }

  /**
   * 'return' [Expr] ';'
   */
  private parseReturn(): ReturnStmt | null {
    const returnToken = this.advance()
    let value: Expression | null = null
    if (!this.check('SEMICOLON')) {
      value = this.parseExpression()
      if (!value) return null
    }
    this.expectSemicolon()
    return { kind: 'ReturnStmt', id: this.nextNodeId(), line: returnToken.lineNumber, value }
  }

  /**
   * '{' Stmt* '}'
   */
  private parseBlock(): Block | null {
    const openToken = this.expect('LBRACE')
    if (!openToken) return null
    const statements = this.parseStatementList()
    if (!this.expect('RBRACE')) return null
    return { kind: 'Block', id: this.nextNodeId(), line: openToken.lineNumber, statements }
  }

  // ---------------- 条件与表达式 ----------------

  /**
   * 条件：逻辑或 → 逻辑与 → 关系/取反/括号条件
   */
  private parseCondition(): Expression | null {
    return this.parseLogicalOr()
  }

  private parseLogicalOr(): Expression | null {
    let left = this.parseLogicalAnd()
    while (left && this.check('OR')) {
      const operatorToken = this.advance()
      const right = this.parseLogicalAnd()
      if (!right) return null
      left = this.binary('||', left, right, operatorToken)
    }
    return left
  }

  private parseLogicalAnd(): Expression | null {
    let left = this.parseRelational()
    while (left && this.check('AND')) {
      const operatorToken = this.advance()
      const right = this.parseRelational()
      if (!right) return null
      left = this.binary('&&', left, right, operatorToken)
    }
    return left
  }

  private parseRelational(): Expression | null {
    const token = this.current()

    if (token.name === 'NOT') {
      this.advance()
      const operand = this.parseRelational()
      if (!operand) return null
      return { kind: 'UnaryOp', id: this.nextNodeId(), line: token.lineNumber, operator: '!', operand }
    }

    let left: Expression | null
    if (token.name === 'LPAREN') {
      // 括号内按条件分析；其后若紧跟算术或关系运算符，括号整体作为操作数继续分析
      this.advance()
      const grouped = this.parseCondition()
      if (!grouped || !this.expect('RPAREN')) return null
      left = this.continueExpression(this.continueTerm(grouped))
      if (!left) return null
    } else {
      left = this.parseExpression()
      if (!left) return null
    }

    const operator = RELATIONAL_OPERATORS.get(this.current().name)
    if (operator === undefined) return left
    const operatorToken = this.advance()
    const right = this.parseExpression()
    if (!right) return null
    return this.binary(operator, left, right, operatorToken)
  }

  /**
   * 加减
   */
  private parseExpression(): Expression | null {
    return this.continueExpression(this.parseTerm())
  }

  /**
   * 以已分析的项为左操作数继续分析加减
   */
  private continueExpression(first: Expression | null): Expression | null {
    let left = first
    let operator = ADDITIVE_OPERATORS.get(this.current().name)
    while (left && operator !== undefined) {
      const operatorToken = this.advance()
      const right = this.parseTerm()
      if (!right) return null
      left = this.binary(operator, left, right, operatorToken)
      operator = ADDITIVE_OPERATORS.get(this.current().name)
    }
    return left
  }

  /**
   * 乘除取模
   */
  private parseTerm(): Expression | null {
    return this.continueTerm(this.parseUnary())
  }

  private continueTerm(first: Expression | null): Expression | null {
    let left = first
    let operator = MULTIPLICATIVE_OPERATORS.get(this.current().name)
    while (left && operator !== undefined) {
      const operatorToken = this.advance()
      const right = this.parseUnary()
      if (!right) return null
      left = this.binary(operator, left, right, operatorToken)
      operator = MULTIPLICATIVE_OPERATORS.get(this.current().name)
    }
    return left
  }

  /**
   * 一元负号
   */
  private parseUnary(): Expression | null {
    if (this.check('MINUS')) {
      const minusToken = this.advance()
      const operand = this.parseUnary()
      if (!operand) return null
      return { kind: 'UnaryOp', id: this.nextNodeId(), line: minusToken.lineNumber, operator: '-', operand }
    }
    return this.parsePrimary()
  }

  /**
   * 标识符、函数调用、字面量、括号表达式
   */
  private parsePrimary(): Expression | null {
    const token = this.current()
    switch (token.name) {
      case 'IDENTIFIER':
        if (this.peek().name === 'LPAREN') return this.parseFunctionCall()
        this.advance()
        return { kind: 'Identifier', id: this.nextNodeId(), line: token.lineNumber, name: token.literal }
      case 'INTEGER_LITERAL':
      case 'FLOAT_LITERAL':
      case 'CHAR_LITERAL': {
        this.advance()
        const valueType: VariableType =
          token.name === 'INTEGER_LITERAL' ? 'int' : token.name === 'FLOAT_LITERAL' ? 'float' : 'char'
        return { kind: 'Literal', id: this.nextNodeId(), line: token.lineNumber, valueType, value: token.literal }
      }
      case 'LPAREN': {
        this.advance()
        const inner = this.parseExpression()
        if (!inner || !this.expect('RPAREN')) return null
        return inner
      }
      default:
        this.error(`期望表达式，实际为 ${describeToken(token)}`)
        return null
    }
  }

  /**
   * IDENTIFIER '(' [Expr (',' Expr)*] ')'
   */
  private parseFunctionCall(): FunctionCall | null {
    const nameToken = this.advance()
    if (!this.expect('LPAREN')) return null
    const args: Expression[] = []
    if (!this.check('RPAREN')) {
      do {
        const arg = this.parseExpression()
        if (!arg) return null
        args.push(arg)
      } while (this.match('COMMA'))
    }
    if (!this.expect('RPAREN')) return null
    return { kind: 'FunctionCall', id: this.nextNodeId(), line: nameToken.lineNumber, name: nameToken.literal, args }
  }

  private binary(operator: BinaryOperator, left: Expression, right: Expression, operatorToken: Token): Expression {
    return { kind: 'BinaryOp', id: this.nextNodeId(), line: operatorToken.lineNumber, operator, left, right }
  }
}

/**
 * 对Token序列进行语法分析，返回语法树根节点；语法错误记录到错误收集器
 * @param tokens 以EOF结尾的Token序列
 * @param errorCollector 错误收集器
 */
export function parseTokenSequence(tokens: Token[], errorCollector: ErrorCollector): Program {
  return new SyntaxAnalyzer(tokens, errorCollector).parseProgram()
}
