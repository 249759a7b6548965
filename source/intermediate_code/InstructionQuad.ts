/**
 * 中间代码指令（四元式）定义及其三地址码文本形式
 */

import { CompilerError } from '../core/utils'
import { BinaryOperator } from '../intermediate/SyntaxTreeNode'

export const BINARY_OPERATORS: readonly BinaryOperator[] = [
  '+',
  '-',
  '*',
  '/',
  '%',
  '==',
  '!=',
  '<',
  '>',
  '<=',
  '>=',
  '&&',
  '||',
]

/**
 * 四元式操作
 */
export type QuadOperation =
  | 'LABEL' // result:
  | 'END' // END_MAIN / END_FUNC_name
  | 'ALLOC' // ALLOC operand1 operand2
  | 'ASSIGN' // result = operand1
  | BinaryOperator // result = operand1 op operand2
  | 'NEG' // result = -operand1
  | 'NOT' // result = !operand1
  | 'PRINT'
  | 'READ'
  | 'GOTO'
  | 'IF_FALSE' // IF_FALSE operand1 GOTO result
  | 'PARAM' // PARAM operand1(名称) operand2(序号)
  | 'PUSH'
  | 'CALL' // CALL operand1(标号) operand2(实参个数)
  | 'RETURN'
  | 'ENTER_SCOPE'
  | 'EXIT_SCOPE'

// 函数调用返回值的伪变量
export const RETURN_VALUE_NAME = 'RETVAL'

export function isBinaryOperator(value: string): value is BinaryOperator {
  return BINARY_OPERATORS.some(operator => operator === value)
}

/**
 * 四元式：(op, arg1, arg2, res)
 */
export class InstructionQuad {
  private readonly _operation: QuadOperation // 操作符
  private readonly _operand1: string // 第一个操作数
  private readonly _operand2: string // 第二个操作数
  private readonly _result: string // 结果

  get operation(): QuadOperation {
    return this._operation
  }

  get operand1(): string {
    return this._operand1
  }

  get operand2(): string {
    return this._operand2
  }

  get result(): string {
    return this._result
  }

  constructor(operation: QuadOperation, operand1: string = '', operand2: string = '', result: string = '') {
    this._operation = operation
    this._operand1 = operand1
    this._operand2 = operand2
    this._result = result
  }

  /**
   * 本条指令读取的操作数（变量、临时变量或常量）
   */
  get usedOperands(): string[] {
    switch (this._operation) {
      case 'ASSIGN':
      case 'NEG':
      case 'NOT':
      case 'PRINT':
      case 'PUSH':
      case 'IF_FALSE':
        return [this._operand1]
      case 'RETURN':
        return this._operand1 ? [this._operand1] : []
      case 'LABEL':
      case 'END':
      case 'ALLOC':
      case 'READ':
      case 'GOTO':
      case 'PARAM':
      case 'CALL':
      case 'ENTER_SCOPE':
      case 'EXIT_SCOPE':
        return []
      default:
        return [this._operand1, this._operand2]
    }
  }

  /**
   * 三地址码文本形式（一行一条）
   */
  toString(): string {
    switch (this._operation) {
      case 'LABEL':
        return `${this._result}:`
      case 'END':
        return this._result
      case 'ALLOC':
        return `ALLOC ${this._operand1} ${this._operand2}`
      case 'ASSIGN':
        return `${this._result} = ${this._operand1}`
      case 'NEG':
        return `${this._result} = -${this._operand1}`
      case 'NOT':
        return `${this._result} = !${this._operand1}`
      case 'PRINT':
        return `PRINT ${this._operand1}`
      case 'READ':
        return `READ ${this._result}`
      case 'GOTO':
        return `GOTO ${this._result}`
      case 'IF_FALSE':
        return `IF_FALSE ${this._operand1} GOTO ${this._result}`
      case 'PARAM':
        return `PARAM ${this._operand1} ${this._operand2}`
      case 'PUSH':
        return `PUSH ${this._operand1}`
      case 'CALL':
        return `CALL ${this._operand1} ${this._operand2}`
      case 'RETURN':
        return this._operand1 ? `RETURN ${this._operand1}` : 'RETURN'
      case 'ENTER_SCOPE':
      case 'EXIT_SCOPE':
        return this._operation
      default:
        return `${this._result} = ${this._operand1} ${this._operation} ${this._operand2}`
    }
  }

  /**
   * 从一行三地址码文本解析
   */
  static parse(line: string): InstructionQuad {
    const text = line.trim()
    // 字符常量可能含空格，整体作为一个记号
    const parts = text.match(/'.'|\S+/g) ?? []
    const fail = (): never => {
      throw new CompilerError(`无法解析的三地址码: ${text}`)
    }

    if (parts.length === 1) {
      const [word] = parts
      if (word.endsWith(':')) return new InstructionQuad('LABEL', '', '', word.slice(0, -1))
      if (word.startsWith('END_')) return new InstructionQuad('END', '', '', word)
      if (word === 'ENTER_SCOPE' || word === 'EXIT_SCOPE') return new InstructionQuad(word)
      if (word === 'RETURN') return new InstructionQuad('RETURN')
      return fail()
    }

    const [head, ...rest] = parts
    switch (head) {
      case 'ALLOC':
        return rest.length === 2 ? new InstructionQuad('ALLOC', rest[0], rest[1]) : fail()
      case 'PRINT':
        return rest.length === 1 ? new InstructionQuad('PRINT', rest[0]) : fail()
      case 'PUSH':
        return rest.length === 1 ? new InstructionQuad('PUSH', rest[0]) : fail()
      case 'RETURN':
        return rest.length === 1 ? new InstructionQuad('RETURN', rest[0]) : fail()
      case 'READ':
        return rest.length === 1 ? new InstructionQuad('READ', '', '', rest[0]) : fail()
      case 'GOTO':
        return rest.length === 1 ? new InstructionQuad('GOTO', '', '', rest[0]) : fail()
      case 'IF_FALSE':
        return rest.length === 3 && rest[1] === 'GOTO' ? new InstructionQuad('IF_FALSE', rest[0], '', rest[2]) : fail()
      case 'PARAM':
        return rest.length === 2 ? new InstructionQuad('PARAM', rest[0], rest[1]) : fail()
      case 'CALL':
        return rest.length === 2 ? new InstructionQuad('CALL', rest[0], rest[1]) : fail()
    }

    if (rest[0] !== '=') return fail()
    const rhs = rest.slice(1)
    if (rhs.length === 3) {
      const operator = rhs[1]
      return isBinaryOperator(operator) ? new InstructionQuad(operator, rhs[0], rhs[2], head) : fail()
    }
    if (rhs.length !== 1) return fail()
    const value = rhs[0]
    if (value.length > 1 && value.startsWith('!')) return new InstructionQuad('NOT', value.slice(1), '', head)
    if (value.length > 1 && value.startsWith('-')) return new InstructionQuad('NEG', value.slice(1), '', head)
    return new InstructionQuad('ASSIGN', value, '', head)
  }
}

/**
 * 逐行解析三地址码文本，忽略空行
 */
export function parseInstructionText(text: string): InstructionQuad[] {
  return text
    .split('\n')
    .filter(line => line.trim().length > 0)
    .map(line => InstructionQuad.parse(line))
}

/**
 * 指令序列的文本形式
 */
export function formatInstructions(instructions: readonly InstructionQuad[]): string[] {
  return instructions.map(instruction => instruction.toString())
}
