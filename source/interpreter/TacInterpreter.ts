/**
 * 三地址码解释器
 * 每次调用一个栈帧，栈帧内按 ENTER_SCOPE / EXIT_SCOPE 维护嵌套作用域
 */

import { CompilerError, MAX_INTERPRETER_STEPS, requireCondition } from '../core/utils'
import { VariableType } from '../intermediate/DataTypes'
import { BinaryOperator } from '../intermediate/SyntaxTreeNode'
import { InstructionQuad, RETURN_VALUE_NAME, isBinaryOperator } from '../intermediate_code/InstructionQuad'
import { END_MAIN_LABEL, MAIN_LABEL } from '../intermediate_code/IntermediateCodeGenerator'

/**
 * 运行时值，char 以字符编码保存
 */
export interface RuntimeValue {
  type: VariableType
  value: number
}

interface Variable {
  declaredType: VariableType | null // 形参按实参类型登记，没有声明类型
  current: RuntimeValue
}

interface Frame {
  scopes: Map<string, Variable>[]
  temporaries: Map<string, RuntimeValue>
  args: RuntimeValue[]
  returnAddress: number
}

export interface InterpreterOptions {
  input?: readonly string[] // tell 语句依次读取的输入
  maxSteps?: number
}

const VARIABLE_TYPES: readonly VariableType[] = ['int', 'float', 'char']

function toVariableType(text: string): VariableType {
  const matched = VARIABLE_TYPES.find(type => type === text)
  requireCondition(matched !== undefined, `未知的变量类型: ${text}`)
  return matched
}

/**
 * 运行时值的输出形式
 */
export function formatRuntimeValue(value: RuntimeValue): string {
  return value.type === 'char' ? String.fromCharCode(value.value) : String(value.value)
}

function truth(flag: boolean): RuntimeValue {
  return { type: 'int', value: flag ? 1 : 0 }
}

/**
 * 二元运算；char 按字符编码参与运算，int 与 int 的除法与取模向零截断
 */
export function evaluateBinary(operator: BinaryOperator, left: RuntimeValue, right: RuntimeValue): RuntimeValue {
  const a = left.value
  const b = right.value
  const type: VariableType = left.type === 'float' || right.type === 'float' ? 'float' : 'int'
  switch (operator) {
    case '+':
      return { type, value: a + b }
    case '-':
      return { type, value: a - b }
    case '*':
      return { type, value: a * b }
    case '/':
      if (b === 0) throw new CompilerError('运行错误：除数为零')
      return { type, value: type === 'int' ? Math.trunc(a / b) : a / b }
    case '%':
      if (b === 0) throw new CompilerError('运行错误：除数为零')
      return { type, value: a % b }
    case '==':
      return truth(a === b)
    case '!=':
      return truth(a !== b)
    case '<':
      return truth(a < b)
    case '>':
      return truth(a > b)
    case '<=':
      return truth(a <= b)
    case '>=':
      return truth(a >= b)
    case '&&':
      return truth(a !== 0 && b !== 0)
    case '||':
      return truth(a !== 0 || b !== 0)
  }
}

/**
 * 赋值时按变量声明类型转换：char 赋给 int 取其编码，int 赋给 float 拓宽
 */
function coerce(value: RuntimeValue, declaredType: VariableType | null): RuntimeValue {
  if (declaredType === null || declaredType === value.type) return value
  if (declaredType === 'char') return { type: 'char', value: Math.trunc(value.value) }
  return { type: declaredType, value: declaredType === 'int' ? Math.trunc(value.value) : value.value }
}

export class TacInterpreter {
  private readonly _instructions: readonly InstructionQuad[]
  private readonly _labels = new Map<string, number>() // 标号 -> 指令下标
  private readonly _input: string[]
  private readonly _maxSteps: number
  private readonly _output: string[] = []
  private readonly _argumentStack: RuntimeValue[] = [] // PUSH 压入、CALL 弹出
  private _frames: Frame[] = []
  private _returnValue: RuntimeValue = { type: 'int', value: 0 }

  get output(): readonly string[] {
    return this._output
  }

  constructor(instructions: readonly InstructionQuad[], options: InterpreterOptions = {}) {
    this._instructions = instructions
    this._input = [...(options.input ?? [])]
    this._maxSteps = options.maxSteps ?? MAX_INTERPRETER_STEPS
    instructions.forEach((instruction, index) => {
      if (instruction.operation === 'LABEL') {
        requireCondition(!this._labels.has(instruction.result), `标号 ${instruction.result} 重复定义`)
        this._labels.set(instruction.result, index)
      }
    })
  }

  private get frame(): Frame {
    const frame = this._frames[this._frames.length - 1]
    requireCondition(frame !== undefined, '运行错误：没有活动的栈帧')
    return frame
  }

  private labelIndex(label: string): number {
    const index = this._labels.get(label)
    requireCondition(index !== undefined, `运行错误：标号 ${label} 不存在`)
    return index
  }

  private findVariable(name: string): Variable | undefined {
    const scopes = this.frame.scopes
    for (let i = scopes.length - 1; i >= 0; i--) {
      const variable = scopes[i].get(name)
      if (variable) return variable
    }
    return undefined
  }

  private currentScope(): Map<string, Variable> {
    const scopes = this.frame.scopes
    requireCondition(scopes.length > 0, '运行错误：作用域栈为空')
    return scopes[scopes.length - 1]
  }

  /**
   * 操作数求值：常量、RETVAL、变量或临时变量
   */
  private read(operand: string): RuntimeValue {
    if (/^'.'$/.test(operand)) return { type: 'char', value: operand.charCodeAt(1) }
    if (/^-?\d+$/.test(operand)) return { type: 'int', value: Number(operand) }
    if (/^-?\d+\.\d*$/.test(operand)) return { type: 'float', value: Number(operand) }
    if (operand === RETURN_VALUE_NAME) return this._returnValue

    const variable = this.findVariable(operand)
    if (variable) return variable.current
    const temporary = this.frame.temporaries.get(operand)
    requireCondition(temporary !== undefined, `运行错误：变量 ${operand} 未定义`)
    return temporary
  }

  private write(name: string, value: RuntimeValue): void {
    const variable = this.findVariable(name)
    if (variable) {
      variable.current = coerce(value, variable.declaredType)
    } else {
      this.frame.temporaries.set(name, value)
    }
  }

  private readInput(name: string): void {
    const text = this._input.shift()
    if (text === undefined) throw new CompilerError(`运行错误：tell ${name} 没有可用的输入`)
    const variable = this.findVariable(name)
    requireCondition(variable !== undefined, `运行错误：变量 ${name} 未定义`)

    const type = variable.declaredType ?? 'int'
    if (type === 'char') {
      requireCondition(text.length > 0, `运行错误：tell ${name} 的输入为空`)
      variable.current = { type, value: text.charCodeAt(0) }
      return
    }
    const value = Number(text.trim())
    requireCondition(text.trim().length > 0 && !Number.isNaN(value), `运行错误：输入 "${text}" 不是合法的 ${type} 值`)
    variable.current = { type, value: type === 'int' ? Math.trunc(value) : value }
  }

  private pushFrame(args: RuntimeValue[], returnAddress: number): void {
    this._frames.push({ scopes: [new Map()], temporaries: new Map(), args, returnAddress })
  }

  /**
   * 从 MAIN: 执行到 END_MAIN，返回所有 show 输出
   */
  run(): string[] {
    let pc = this.labelIndex(MAIN_LABEL) + 1
    let steps = 0
    this._frames = []
    this.pushFrame([], -1)

    for (;;) {
      requireCondition(pc < this._instructions.length, '运行错误：执行越过了指令序列末尾')
      steps++
      if (steps > this._maxSteps) {
        throw new CompilerError(`运行错误：执行步数超过上限 ${this._maxSteps}，可能存在死循环`)
      }

      const instruction = this._instructions[pc]
      pc++
      const operation = instruction.operation

      if (isBinaryOperator(operation)) {
        this.write(instruction.result, evaluateBinary(operation, this.read(instruction.operand1), this.read(instruction.operand2)))
        continue
      }

      switch (operation) {
        case 'LABEL':
          break
        case 'END':
          if (instruction.result === END_MAIN_LABEL) return [...this._output]
          throw new CompilerError(`运行错误：函数执行到 ${instruction.result} 仍未返回`)
        case 'ALLOC': {
          const type = toVariableType(instruction.operand2)
          this.currentScope().set(instruction.operand1, { declaredType: type, current: { type, value: 0 } })
          break
        }
        case 'ASSIGN':
          this.write(instruction.result, this.read(instruction.operand1))
          break
        case 'NEG': {
          const operand = this.read(instruction.operand1)
          this.write(instruction.result, { type: operand.type === 'float' ? 'float' : 'int', value: -operand.value })
          break
        }
        case 'NOT':
          this.write(instruction.result, truth(this.read(instruction.operand1).value === 0))
          break
        case 'PRINT':
          this._output.push(formatRuntimeValue(this.read(instruction.operand1)))
          break
        case 'READ':
          this.readInput(instruction.result)
          break
        case 'GOTO':
          pc = this.labelIndex(instruction.result)
          break
        case 'IF_FALSE':
          if (this.read(instruction.operand1).value === 0) pc = this.labelIndex(instruction.result)
          break
        case 'PARAM': {
          const value = this.frame.args[Number(instruction.operand2)]
          requireCondition(value !== undefined, `运行错误：缺少第 ${instruction.operand2} 个实参`)
          this.currentScope().set(instruction.operand1, { declaredType: null, current: value })
          break
        }
        case 'PUSH':
          this._argumentStack.push(this.read(instruction.operand1))
          break
        case 'CALL': {
          // 实参由右向左压栈，栈顶为第0个实参
          const count = Number(instruction.operand2)
          const args: RuntimeValue[] = []
          for (let i = 0; i < count; i++) {
            const value = this._argumentStack.pop()
            requireCondition(value !== undefined, `运行错误：调用 ${instruction.operand1} 的实参不足`)
            args.push(value)
          }
          this.pushFrame(args, pc)
          pc = this.labelIndex(instruction.operand1) + 1
          break
        }
        case 'RETURN': {
          const value = instruction.operand1 ? this.read(instruction.operand1) : { type: 'int' as const, value: 0 }
          requireCondition(this._frames.length > 1, '运行错误：主程序中不能执行 RETURN')
          const frame = this.frame
          this._frames.pop()
          this._returnValue = value
          pc = frame.returnAddress
          break
        }
        case 'ENTER_SCOPE':
          this.frame.scopes.push(new Map())
          break
        case 'EXIT_SCOPE':
          requireCondition(this.frame.scopes.length > 1, '运行错误：作用域栈不平衡')
          this.frame.scopes.pop()
          break
        default:
          throw new CompilerError(`运行错误：无法执行的指令 ${instruction.toString()}`)
      }
    }
  }
}

/**
 * 执行三地址码，返回输出行
 */
export function interpretInstructions(instructions: readonly InstructionQuad[], options: InterpreterOptions = {}): string[] {
  return new TacInterpreter(instructions, options).run()
}
