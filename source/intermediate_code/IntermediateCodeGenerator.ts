/**
 * 中间代码生成器：从语法树生成三地址码
 */

import { assertNever } from '../core/utils'
import {
  Block,
  Expression,
  FunctionDecl,
  IfStmt,
  LoopStmt,
  Program,
  Statement,
} from '../intermediate/SyntaxTreeNode'
import { SemanticAnnotations } from '../semantic_analyzer/SemanticAnalyzer'
import { InstructionQuad, QuadOperation, RETURN_VALUE_NAME } from './InstructionQuad'

export const MAIN_LABEL = 'MAIN'
export const END_MAIN_LABEL = 'END_MAIN'
export const FUNCTION_LABEL_PREFIX = 'FUNC_'
export const TEMPORARY_PREFIX = 't'
export const LABEL_PREFIX = 'L'

/**
 * 中间代码生成器
 * 临时变量与标号计数器属于生成器实例，在整个编译单元内单调递增、不复用
 */
export class IntermediateCodeGenerator {
  private readonly _annotations: SemanticAnnotations // 语义分析旁表（只读）
  private _instructionList: InstructionQuad[] = [] // 所有四元式
  private _temporaryCounter: number = 0 // 临时变量计数
  private _labelCounter: number = 0 // 标号计数

  get instructionList(): readonly InstructionQuad[] {
    return this._instructionList
  }

  constructor(root: Program, annotations: SemanticAnnotations) {
    this._annotations = annotations
    this.processProgram(root)
  }

  /**
   * 分配新的临时变量 tN
   */
  private allocateTemporary(): string {
    return `${TEMPORARY_PREFIX}${this._temporaryCounter++}`
  }

  /**
   * 分配新的标号 LN
   */
  private allocateLabel(): string {
    return `${LABEL_PREFIX}${this._labelCounter++}`
  }

  private createInstruction(operation: QuadOperation, operand1: string = '', operand2: string = '', result: string = ''): void {
    this._instructionList.push(new InstructionQuad(operation, operand1, operand2, result))
  }

  /**
   * 先输出全部函数，再输出 MAIN: ... END_MAIN
   */
  private processProgram(program: Program): void {
    for (const func of program.functions) {
      this.processFunction(func)
    }
    this.createInstruction('LABEL', '', '', MAIN_LABEL)
    for (const statement of program.statements) {
      this.processStatement(statement)
    }
    this.createInstruction('END', '', '', END_MAIN_LABEL)
  }

  /**
   * FUNC_name: / PARAM x i ... / 函数体 / RETURN 0（兜底） / END_FUNC_name
   */
  private processFunction(func: FunctionDecl): void {
    this.createInstruction('LABEL', '', '', FUNCTION_LABEL_PREFIX + func.name)
    func.params.forEach((param, index) => {
      this.createInstruction('PARAM', param.name, String(index))
    })
    this.processBlock(func.body)
    this.createInstruction('RETURN', '0')
    this.createInstruction('END', '', '', `END_${FUNCTION_LABEL_PREFIX}${func.name}`)
  }

  private processBlock(block: Block): void {
    this.createInstruction('ENTER_SCOPE')
    for (const statement of block.statements) {
      this.processStatement(statement)
    }
    this.createInstruction('EXIT_SCOPE')
  }

  private processStatement(statement: Statement): void {
    switch (statement.kind) {
      case 'DeclStmt':
        this.createInstruction('ALLOC', statement.name, statement.varType)
        if (statement.initializer) {
          this.createInstruction('ASSIGN', this.processExpression(statement.initializer), '', statement.name)
        }
        break
      case 'AssignStmt':
        this.createInstruction('ASSIGN', this.processExpression(statement.value), '', statement.name)
        break
      case 'IfStmt':
        this.processIf(statement)
        break
      case 'LoopStmt':
        this.processLoop(statement)
        break
      case 'ConditionalLoopStmt': {
        const startLabel = this.allocateLabel()
        const endLabel = this.allocateLabel()
        this.createInstruction('LABEL', '', '', startLabel)
        const condition = this.processExpression(statement.condition)
        this.createInstruction('IF_FALSE', condition, '', endLabel)
        this.processBlock(statement.body)
        this.createInstruction('GOTO', '', '', startLabel)
        this.createInstruction('LABEL', '', '', endLabel)
        break
      }
      case 'PrintStmt':
        for (const expression of statement.expressions) {
          this.createInstruction('PRINT', this.processExpression(expression))
        }
        break
      case 'InputStmt':
        this.createInstruction('READ', '', '', statement.name)
        break
      case 'ReturnStmt':
        this.createInstruction('RETURN', statement.value ? this.processExpression(statement.value) : '0')
        break
      case 'Block':
        this.processBlock(statement)
        break
      case 'FunctionCall':
        this.processExpression(statement)
        break
      default:
        assertNever(statement, 'IntermediateCodeGenerator.processStatement')
    }
  }

  /**
   * 每个分支依次测试，失败跳到下一个elif/else，所有分支执行完跳到共同的结束标号
   */
  private processIf(statement: IfStmt): void {
    const elifLabels = statement.branches.slice(1).map(() => this.allocateLabel())
    const elseLabel = statement.elseBlock ? this.allocateLabel() : null
    const endLabel = this.allocateLabel()

    statement.branches.forEach((branch, index) => {
      if (index > 0) {
        this.createInstruction('LABEL', '', '', elifLabels[index - 1])
      }
      const falseTarget = index < elifLabels.length ? elifLabels[index] : elseLabel ?? endLabel
      const condition = this.processExpression(branch.condition)
      this.createInstruction('IF_FALSE', condition, '', falseTarget)
      this.processBlock(branch.body)
      this.createInstruction('GOTO', '', '', endLabel)
    })

    if (statement.elseBlock && elseLabel) {
      this.createInstruction('LABEL', '', '', elseLabel)
      this.processBlock(statement.elseBlock)
    }
    this.createInstruction('LABEL', '', '', endLabel)
  }

  /**
   * 计数循环：初始化（沿用已有变量时省略）、测试 var <= end、循环体、var = var + step、跳回测试
   */
  private processLoop(loop: LoopStmt): void {
    const startLabel = this.allocateLabel()
    const endLabel = this.allocateLabel()

    const implicitType = this._annotations.implicitDeclarationOf(loop.id)
    if (implicitType !== undefined) {
      this.createInstruction('ALLOC', loop.variable, implicitType)
    }
    if (loop.start) {
      this.createInstruction('ASSIGN', this.processExpression(loop.start), '', loop.variable)
    }

    this.createInstruction('LABEL', '', '', startLabel)
    const end = this.processExpression(loop.end)
    const test = this.allocateTemporary()
    this.createInstruction('<=', loop.variable, end, test)
    this.createInstruction('IF_FALSE', test, '', endLabel)

    this.processBlock(loop.body)

    const step = loop.step ? this.processExpression(loop.step) : '1'
    const next = this.allocateTemporary()
    this.createInstruction('+', loop.variable, step, next)
    this.createInstruction('ASSIGN', next, '', loop.variable)
    this.createInstruction('GOTO', '', '', startLabel)
    this.createInstruction('LABEL', '', '', endLabel)
  }

  /**
   * 生成表达式的代码，返回保存结果的操作数
   */
  private processExpression(expression: Expression): string {
    switch (expression.kind) {
      case 'Literal':
        return expression.valueType === 'char' ? `'${expression.value}'` : expression.value
      case 'Identifier':
        return expression.name
      case 'BinaryOp': {
        const left = this.processExpression(expression.left)
        const right = this.processExpression(expression.right)
        const result = this.allocateTemporary()
        this.createInstruction(expression.operator, left, right, result)
        return result
      }
      case 'UnaryOp': {
        const operand = this.processExpression(expression.operand)
        const result = this.allocateTemporary()
        this.createInstruction(expression.operator === '-' ? 'NEG' : 'NOT', operand, '', result)
        return result
      }
      case 'FunctionCall': {
        // 实参从左到右求值，从右到左压栈
        const args = expression.args.map(arg => this.processExpression(arg))
        for (const arg of [...args].reverse()) {
          this.createInstruction('PUSH', arg)
        }
        this.createInstruction('CALL', FUNCTION_LABEL_PREFIX + expression.name, String(args.length))
        const result = this.allocateTemporary()
        this.createInstruction('ASSIGN', RETURN_VALUE_NAME, '', result)
        return result
      }
      default:
        return assertNever(expression, 'IntermediateCodeGenerator.processExpression')
    }
  }
}

/**
 * 生成三地址码
 */
export function generateIntermediateCode(program: Program, annotations: SemanticAnnotations): InstructionQuad[] {
  return [...new IntermediateCodeGenerator(program, annotations).instructionList]
}
