/**
 * 三地址码优化：常量折叠、代数化简、删除无用临时变量
 */

import { VariableType } from '../intermediate/DataTypes'
import { BinaryOperator } from '../intermediate/SyntaxTreeNode'
import { InstructionQuad, isBinaryOperator } from '../intermediate_code/InstructionQuad'

const NUMBER_PATTERN = /^-?\d+(\.\d*)?$/
const TEMPORARY_PATTERN = /^t\d+$/
const CHAR_PATTERN = /^'.'$/

export function isNumericConstant(operand: string): boolean {
  return NUMBER_PATTERN.test(operand)
}

function isFloatConstant(operand: string): boolean {
  return operand.includes('.')
}

function formatConstant(value: number, isFloat: boolean): string {
  if (!isFloat) return String(value)
  return Number.isInteger(value) ? value.toFixed(1) : String(value)
}

/**
 * 计算两个数值常量的运算结果，无法折叠（如除数为零）时返回null
 */
export function foldBinary(operator: BinaryOperator, left: string, right: string): string | null {
  const isFloat = isFloatConstant(left) || isFloatConstant(right)
  const a = Number(left)
  const b = Number(right)
  switch (operator) {
    case '+':
      return formatConstant(a + b, isFloat)
    case '-':
      return formatConstant(a - b, isFloat)
    case '*':
      return formatConstant(a * b, isFloat)
    case '/':
      if (b === 0) return null
      return formatConstant(isFloat ? a / b : Math.trunc(a / b), isFloat)
    case '%':
      if (b === 0) return null
      return formatConstant(a % b, isFloat)
    case '==':
      return a === b ? '1' : '0'
    case '!=':
      return a !== b ? '1' : '0'
    case '<':
      return a < b ? '1' : '0'
    case '>':
      return a > b ? '1' : '0'
    case '<=':
      return a <= b ? '1' : '0'
    case '>=':
      return a >= b ? '1' : '0'
    case '&&':
      return a !== 0 && b !== 0 ? '1' : '0'
    case '||':
      return a !== 0 || b !== 0 ? '1' : '0'
  }
}

/**
 * 代数化简：x*1、1*x、x+0、0+x、x-0 化为 x，x*0、0*x 化为 0
 * 只化简静态类型为 int 或 float 的操作数，char 参与运算时结果为 int，不能直接复制
 */
export function simplifyAlgebraic(
  operator: BinaryOperator,
  left: string,
  right: string,
  leftType: VariableType | null,
  rightType: VariableType | null
): string | null {
  const numeric = (type: VariableType | null): type is 'int' | 'float' => type === 'int' || type === 'float'
  const zeroOf = (type: 'int' | 'float') => (type === 'float' ? '0.0' : '0')
  switch (operator) {
    case '*':
      if (right === '1' && numeric(leftType)) return left
      if (left === '1' && numeric(rightType)) return right
      if (right === '0' && numeric(leftType)) return zeroOf(leftType)
      if (left === '0' && numeric(rightType)) return zeroOf(rightType)
      return null
    case '+':
      if (right === '0' && numeric(leftType)) return left
      if (left === '0' && numeric(rightType)) return right
      return null
    case '-':
      return right === '0' && numeric(leftType) ? left : null
    default:
      return null
  }
}

/**
 * 常量操作数的类型；不是常量时返回null
 */
export function constantType(operand: string): VariableType | null {
  if (CHAR_PATTERN.test(operand)) return 'char'
  if (!isNumericConstant(operand)) return null
  return isFloatConstant(operand) ? 'float' : 'int'
}

const ARITHMETIC_OPERATORS: ReadonlySet<string> = new Set(['+', '-', '*', '/', '%'])
const VARIABLE_TYPES: readonly VariableType[] = ['int', 'float', 'char']

function toDeclaredType(text: string): VariableType | null {
  return VARIABLE_TYPES.find(type => type === text) ?? null
}

export class TacOptimizer {
  private readonly _declaredNames = new Set<string>() // 源程序中声明的变量与形参，不视为临时变量
  private readonly _declaredTypes = new Map<string, VariableType | null>() // 同名变量类型不一或为形参时为null
  private _knownTemporaries = new Map<string, string>() // 临时变量 -> 可直接替换它的常量或临时变量
  private _temporaryTypes = new Map<string, VariableType | null>() // 临时变量 -> 产生它的指令的结果类型

  constructor(instructions: readonly InstructionQuad[]) {
    for (const instruction of instructions) {
      const name = instruction.operand1
      if (instruction.operation === 'ALLOC') {
        const type = toDeclaredType(instruction.operand2)
        const previous = this._declaredTypes.get(name)
        this._declaredTypes.set(name, previous === undefined || previous === type ? type : null)
        this._declaredNames.add(name)
      } else if (instruction.operation === 'PARAM') {
        this._declaredTypes.set(name, null)
        this._declaredNames.add(name)
      }
    }
  }

  private isTemporary(name: string): boolean {
    return TEMPORARY_PATTERN.test(name) && !this._declaredNames.has(name)
  }

  private substitute(operand: string): string {
    return this._knownTemporaries.get(operand) ?? operand
  }

  /**
   * 操作数的静态类型：常量、声明的变量、临时变量；RETVAL 与无法确定的返回null
   */
  private operandType(operand: string): VariableType | null {
    const constant = constantType(operand)
    if (constant !== null) return constant
    if (this.isTemporary(operand)) return this._temporaryTypes.get(operand) ?? null
    return this._declaredTypes.get(operand) ?? null
  }

  /**
   * 指令结果的静态类型，与解释器的求值规则一致
   */
  private resultType(instruction: InstructionQuad): VariableType | null {
    const operation = instruction.operation
    if (operation === 'ASSIGN') return this.operandType(instruction.operand1)
    if (operation === 'NOT') return 'int'
    if (operation === 'NEG') {
      const type = this.operandType(instruction.operand1)
      if (type === null) return null
      return type === 'float' ? 'float' : 'int'
    }
    if (!isBinaryOperator(operation)) return null
    if (!ARITHMETIC_OPERATORS.has(operation)) return 'int'
    const leftType = this.operandType(instruction.operand1)
    const rightType = this.operandType(instruction.operand2)
    if (leftType === null || rightType === null) return null
    return leftType === 'float' || rightType === 'float' ? 'float' : 'int'
  }

  /**
   * 逐条折叠，并把值为常量或另一临时变量的临时变量传播到后续使用处（临时变量只被赋值一次）
   */
  private foldInstruction(instruction: InstructionQuad): InstructionQuad {
    const operation = instruction.operation
    const operand1 = instruction.usedOperands.includes(instruction.operand1) ? this.substitute(instruction.operand1) : instruction.operand1
    const operand2 = isBinaryOperator(operation) ? this.substitute(instruction.operand2) : instruction.operand2
    const result = instruction.result

    let folded = new InstructionQuad(operation, operand1, operand2, result)
    if (isBinaryOperator(operation)) {
      const value =
        isNumericConstant(operand1) && isNumericConstant(operand2)
          ? foldBinary(operation, operand1, operand2)
          : simplifyAlgebraic(operation, operand1, operand2, this.operandType(operand1), this.operandType(operand2))
      if (value !== null) folded = new InstructionQuad('ASSIGN', value, '', result)
    } else if (operation === 'NEG' && isNumericConstant(operand1)) {
      folded = new InstructionQuad('ASSIGN', formatConstant(-Number(operand1), isFloatConstant(operand1)), '', result)
    } else if (operation === 'NOT' && isNumericConstant(operand1)) {
      folded = new InstructionQuad('ASSIGN', Number(operand1) === 0 ? '1' : '0', '', result)
    }

    const source = folded.operand1
    if (this.isTemporary(result)) {
      this._temporaryTypes.set(result, this.resultType(folded))
      if (folded.operation === 'ASSIGN' && (isNumericConstant(source) || this.isTemporary(source))) {
        this._knownTemporaries.set(result, source)
      }
    }
    return folded
  }

  /**
   * 删除结果为临时变量、且该临时变量从未被读取的纯计算指令，直到不再变化
   */
  private removeDeadTemporaries(instructions: InstructionQuad[]): InstructionQuad[] {
    let current = instructions
    for (;;) {
      const used = new Set<string>()
      for (const instruction of current) {
        for (const operand of instruction.usedOperands) used.add(operand)
      }
      const next = current.filter(instruction => {
        const pure = instruction.operation === 'ASSIGN' || instruction.operation === 'NEG' || instruction.operation === 'NOT' || isBinaryOperator(instruction.operation)
        return !(pure && this.isTemporary(instruction.result) && !used.has(instruction.result))
      })
      if (next.length === current.length) return next
      current = next
    }
  }

  optimize(instructions: readonly InstructionQuad[]): InstructionQuad[] {
    this._knownTemporaries = new Map()
    this._temporaryTypes = new Map()
    const folded = instructions.map(instruction => this.foldInstruction(instruction))
    return this.removeDeadTemporaries(folded)
  }
}

/**
 * 优化三地址码序列，作用域标记与标号保持不变
 */
export function optimizeInstructions(instructions: readonly InstructionQuad[]): InstructionQuad[] {
  return new TacOptimizer(instructions).optimize(instructions)
}
