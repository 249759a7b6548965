/**
 * 语义分析器：作用域、类型检查、初始化检查与函数签名检查
 * 第一遍登记全部函数签名，第二遍分析各函数体与主语句列表
 */

import { ErrorCollector, ErrorType } from '../core/ErrorCollector'
import { assertNever, requireCondition } from '../core/utils'
import { DataType, VariableType, isArithmeticType, isNumericType, isTypeCompatible } from '../intermediate/DataTypes'
import {
  Block,
  Expression,
  FunctionCall,
  FunctionDecl,
  LoopStmt,
  Program,
  ReturnStmt,
  Statement,
} from '../intermediate/SyntaxTreeNode'
import { FunctionSignature, SymbolEntry, SymbolTable, formatSignature } from './SymbolTable'

/**
 * 语义分析结果的旁表：节点编号 -> 推导出的类型，分析结束后只读
 */
export class SemanticAnnotations {
  private readonly _expressionTypes = new Map<number, DataType>() // 表达式节点类型
  private readonly _implicitDeclarations = new Map<number, VariableType>() // 隐式声明循环变量的计数循环

  recordType(nodeId: number, type: DataType): void {
    requireCondition(!this._expressionTypes.has(nodeId), `节点 ${nodeId} 的类型已标注`)
    this._expressionTypes.set(nodeId, type)
  }

  typeOf(nodeId: number): DataType | undefined {
    return this._expressionTypes.get(nodeId)
  }

  recordImplicitDeclaration(loopId: number, type: VariableType): void {
    this._implicitDeclarations.set(loopId, type)
  }

  /**
   * 计数循环是否隐式声明了循环变量，返回其类型
   */
  implicitDeclarationOf(loopId: number): VariableType | undefined {
    return this._implicitDeclarations.get(loopId)
  }
}

export interface SemanticResult {
  symbolTable: SymbolTable
  annotations: SemanticAnnotations
}

/**
 * 语句序列是否在语法结构上保证执行到return：
 * 直接含return，或某个if的全部分支（必须有else）都保证return，或循环体内含return
 */
export function guaranteesReturn(statements: readonly Statement[]): boolean {
  return statements.some(statement => {
    switch (statement.kind) {
      case 'ReturnStmt':
        return true
      case 'Block':
        return guaranteesReturn(statement.statements)
      case 'IfStmt':
        return (
          statement.elseBlock !== null &&
          statement.branches.every(branch => guaranteesReturn(branch.body.statements)) &&
          guaranteesReturn(statement.elseBlock.statements)
        )
      case 'LoopStmt':
      case 'ConditionalLoopStmt':
        return guaranteesReturn(statement.body.statements)
      default:
        return false
    }
  })
}

export class SemanticAnalyzer {
  private readonly _errorCollector: ErrorCollector
  private readonly _symbolTable = new SymbolTable()
  private readonly _annotations = new SemanticAnnotations()
  private readonly _functionEntries = new Map<number, SymbolEntry>() // 函数声明节点 -> 表项

  constructor(errorCollector: ErrorCollector) {
    this._errorCollector = errorCollector
  }

  analyze(program: Program): SemanticResult {
    // 第一遍：登记函数签名，使函数之间可以相互调用
    for (const func of program.functions) {
      const signature: FunctionSignature = {
        paramTypes: func.params.map(param => param.type),
        returnType: func.returnType,
      }
      const { entry, previous } = this._symbolTable.declareFunction(func.name, signature, func.line)
      if (previous) {
        this.error(`函数 ${func.name} 重复定义（首次定义于第${previous.line}行）`, func.line)
        this._functionEntries.set(func.id, { ...entry, signature, type: signature.returnType, line: func.line })
      } else {
        this._functionEntries.set(func.id, entry)
      }
    }

    // 第二遍：函数体，然后是主语句
    for (const func of program.functions) {
      this.visitFunction(func)
    }
    for (const statement of program.statements) {
      this.visitStatement(statement)
    }

    return { symbolTable: this._symbolTable, annotations: this._annotations }
  }

  private error(message: string, line: number): void {
    this._errorCollector.addSemanticError(message, line)
  }

  private warning(message: string, line: number): void {
    this._errorCollector.addWarning(ErrorType.SemanticError, message, line)
  }

  private visitFunction(func: FunctionDecl): void {
    const entry = this._functionEntries.get(func.id)
    requireCondition(entry !== undefined, `函数 ${func.name} 未登记`)
    this._symbolTable.currentFunction = entry
    this._symbolTable.enterScope()

    for (const param of func.params) {
      const { previous } = this._symbolTable.declareVariable(param.name, param.type, param.line, true)
      if (previous) {
        this.error(`函数 ${func.name} 的参数 ${param.name} 重复`, param.line)
      }
    }
    this.visitBlock(func.body)

    this._symbolTable.exitScope()
    this._symbolTable.currentFunction = null

    if (func.returnType !== 'void' && !guaranteesReturn(func.body.statements)) {
      this.error(`函数 ${func.name} 的返回类型为 ${func.returnType}，但并非所有分支都有 return 语句`, func.line)
    }
  }

  private visitBlock(block: Block): void {
    this._symbolTable.enterScope()
    for (const statement of block.statements) {
      this.visitStatement(statement)
    }
    this._symbolTable.exitScope()

    const returnIndex = block.statements.findIndex(statement => statement.kind === 'ReturnStmt')
    const unreachable = returnIndex === -1 ? undefined : block.statements[returnIndex + 1]
    if (unreachable) {
      this.warning('return 语句之后的代码不会被执行', unreachable.line)
    }
  }

  private visitStatement(statement: Statement): void {
    switch (statement.kind) {
      case 'DeclStmt': {
        const initType = statement.initializer ? this.visitExpression(statement.initializer) : null
        const previous = this._symbolTable.lookupCurrentScope(statement.name)
        if (previous) {
          this.error(`变量 ${statement.name} 在当前作用域中重复声明（首次声明于第${previous.line}行）`, statement.line)
          return
        }
        if (initType !== null && !isTypeCompatible(statement.varType, initType)) {
          this.error(`类型不匹配：不能将 ${initType} 类型的值赋给 ${statement.varType} 类型的变量 ${statement.name}`, statement.line)
        }
        this._symbolTable.declareVariable(statement.name, statement.varType, statement.line, statement.initializer !== null)
        return
      }
      case 'AssignStmt': {
        const valueType = this.visitExpression(statement.value)
        const entry = this.lookupVariable(statement.name, statement.line)
        if (!entry) return
        if (!isTypeCompatible(entry.type, valueType)) {
          this.error(`类型不匹配：不能将 ${valueType} 类型的值赋给 ${entry.type} 类型的变量 ${statement.name}`, statement.line)
        }
        entry.initialized = true
        return
      }
      case 'IfStmt':
        for (const branch of statement.branches) {
          this.visitExpression(branch.condition)
          this.visitBlock(branch.body)
        }
        if (statement.elseBlock) this.visitBlock(statement.elseBlock)
        return
      case 'LoopStmt':
        this.visitLoop(statement)
        return
      case 'ConditionalLoopStmt':
        this.visitExpression(statement.condition)
        this.visitBlock(statement.body)
        return
      case 'PrintStmt':
        for (const expression of statement.expressions) {
          this.visitExpression(expression)
        }
        return
      case 'InputStmt': {
        const entry = this.lookupVariable(statement.name, statement.line)
        if (entry) entry.initialized = true
        return
      }
      case 'ReturnStmt':
        this.visitReturn(statement)
        return
      case 'Block':
        this.visitBlock(statement)
        return
      case 'FunctionCall':
        this.visitExpression(statement)
        return
      default:
        assertNever(statement, 'SemanticAnalyzer.visitStatement')
    }
  }

  /**
   * 查找可赋值的变量，未声明或为函数时记录错误并返回null
   */
  private lookupVariable(name: string, line: number): SymbolEntry | null {
    const entry = this._symbolTable.lookup(name)
    if (!entry) {
      this.error(`变量 ${name} 未声明`, line)
      return null
    }
    if (entry.signature) {
      this.error(`${name} 是函数，不能作为变量使用`, line)
      return null
    }
    return entry
  }

  private visitLoop(loop: LoopStmt): void {
    this._symbolTable.enterScope()

    if (loop.start === null) {
      // 沿用已有变量：必须是已初始化的数值变量
      const entry = this.lookupVariable(loop.variable, loop.line)
      if (entry && !isNumericType(entry.type)) {
        this.error(`循环变量 ${loop.variable} 必须是数值类型，实际为 ${entry.type}`, loop.line)
      } else if (entry && !entry.initialized) {
        this.error(`循环变量 ${loop.variable} 在使用前未初始化`, loop.line)
      }
    } else {
      const startType = this.visitExpression(loop.start)
      if (!isNumericType(startType)) {
        this.error(`循环起始值必须是数值类型，实际为 ${startType}`, loop.line)
      }
      const existing = this._symbolTable.lookup(loop.variable)
      if (!existing) {
        const implicitType: VariableType = startType === 'float' ? 'float' : 'int'
        this._symbolTable.declareVariable(loop.variable, implicitType, loop.line, true)
        this._annotations.recordImplicitDeclaration(loop.id, implicitType)
      } else {
        const entry = this.lookupVariable(loop.variable, loop.line)
        if (entry && !isNumericType(entry.type)) {
          this.error(`循环变量 ${loop.variable} 必须是数值类型，实际为 ${entry.type}`, loop.line)
        } else if (entry && !isTypeCompatible(entry.type, startType)) {
          this.error(`类型不匹配：不能将 ${startType} 类型的起始值赋给 ${entry.type} 类型的循环变量 ${loop.variable}`, loop.line)
        }
        if (entry) entry.initialized = true
      }
    }

    const endType = this.visitExpression(loop.end)
    if (!isNumericType(endType)) {
      this.error(`循环终止值必须是数值类型，实际为 ${endType}`, loop.line)
    }
    if (loop.step) {
      const stepType = this.visitExpression(loop.step)
      if (!isNumericType(stepType)) {
        this.error(`循环步长必须是数值类型，实际为 ${stepType}`, loop.line)
      }
    }

    this.visitBlock(loop.body)
    this._symbolTable.exitScope()
  }

  private visitReturn(statement: ReturnStmt): void {
    const valueType = statement.value ? this.visitExpression(statement.value) : null
    const func = this._symbolTable.currentFunction
    if (!func) {
      this.error('return 语句只能出现在函数体内', statement.line)
      return
    }
    if (func.type === 'void') {
      if (valueType !== null) this.error(`void 函数 ${func.name} 不能返回值`, statement.line)
      return
    }
    if (valueType === null) {
      this.error(`函数 ${func.name} 必须返回 ${func.type} 类型的值`, statement.line)
    } else if (!isTypeCompatible(func.type, valueType)) {
      this.error(`返回值类型不匹配：函数 ${func.name} 应返回 ${func.type}，实际为 ${valueType}`, statement.line)
    }
  }

  private visitExpression(expression: Expression): DataType {
    const type = this.inferType(expression)
    this._annotations.recordType(expression.id, type)
    return type
  }

  private inferType(expression: Expression): DataType {
    switch (expression.kind) {
      case 'Literal':
        return expression.valueType
      case 'Identifier': {
        const entry = this._symbolTable.lookup(expression.name)
        if (!entry) {
          this.error(`变量 ${expression.name} 未声明`, expression.line)
          return 'int'
        }
        if (entry.signature) {
          this.error(`${expression.name} 是函数，不能作为变量使用`, expression.line)
          return 'int'
        }
        if (!entry.initialized) {
          this.error(`变量 ${expression.name} 在初始化之前被使用`, expression.line)
        }
        return entry.type
      }
      case 'BinaryOp': {
        const leftType = this.visitExpression(expression.left)
        const rightType = this.visitExpression(expression.right)
        switch (expression.operator) {
          case '&&':
          case '||':
            return 'bool'
          case '==':
          case '!=':
          case '<':
          case '>':
          case '<=':
          case '>=':
            if (!(isArithmeticType(leftType) && isArithmeticType(rightType)) && leftType !== rightType) {
              this.error(`无法比较 ${leftType} 与 ${rightType} 类型的值`, expression.line)
            }
            return 'bool'
          default:
            if (isArithmeticType(leftType) && isArithmeticType(rightType)) {
              return leftType === 'float' || rightType === 'float' ? 'float' : 'int'
            }
            this.error(`运算符 ${expression.operator} 的操作数类型无效：${leftType} 与 ${rightType}`, expression.line)
            return 'int'
        }
      }
      case 'UnaryOp': {
        const operandType = this.visitExpression(expression.operand)
        if (expression.operator === '!') return 'bool'
        if (!isNumericType(operandType)) {
          this.error(`一元负号的操作数必须是数值类型，实际为 ${operandType}`, expression.line)
          return 'int'
        }
        return operandType
      }
      case 'FunctionCall':
        return this.checkCall(expression)
      default:
        return assertNever(expression, 'SemanticAnalyzer.inferType')
    }
  }

  /**
   * 函数调用：实参个数与类型须与签名一致，类型为函数返回类型
   */
  private checkCall(call: FunctionCall): DataType {
    const argTypes = call.args.map(arg => this.visitExpression(arg))
    const entry = this._symbolTable.lookup(call.name)
    if (!entry) {
      this.error(`函数 ${call.name} 未声明`, call.line)
      return 'int'
    }
    if (!entry.signature) {
      this.error(`${call.name} 不是函数`, call.line)
      return 'int'
    }

    const signature = entry.signature
    const expected = formatSignature(call.name, signature)
    const actual = `${call.name}(${argTypes.join(', ')})`
    if (argTypes.length !== signature.paramTypes.length) {
      this.error(
        `函数 ${call.name} 参数个数不匹配：期望 ${signature.paramTypes.length} 个，实际 ${argTypes.length} 个（期望 ${expected}，实际 ${actual}）`,
        call.line
      )
    } else {
      signature.paramTypes.forEach((paramType, index) => {
        if (!isTypeCompatible(paramType, argTypes[index])) {
          this.error(
            `函数 ${call.name} 第${index + 1}个参数类型不匹配：期望 ${paramType}，实际 ${argTypes[index]}（期望 ${expected}，实际 ${actual}）`,
            call.line
          )
        }
      })
    }
    return signature.returnType
  }
}

/**
 * 对语法树进行语义分析，错误记录到错误收集器
 */
export function analyzeProgram(program: Program, errorCollector: ErrorCollector): SemanticResult {
  return new SemanticAnalyzer(errorCollector).analyze(program)
}
