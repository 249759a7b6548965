/**
 * 抽象语法树节点定义
 * 所有节点组成一个封闭的标签联合，各遍历过程按 kind 穷尽匹配
 */

import { assertNever } from '../core/utils'
import { ReturnType, VariableType } from './DataTypes'

interface NodeBase {
  /** 节点编号，在一次语法分析中唯一，语义分析的类型标注以此为键 */
  id: number
  /** 所在行号 */
  line: number
}

export type BinaryOperator = '+' | '-' | '*' | '/' | '%' | '==' | '!=' | '<' | '>' | '<=' | '>=' | '&&' | '||'

export type UnaryOperator = '-' | '!'

export interface Program extends NodeBase {
  kind: 'Program'
  functions: FunctionDecl[]
  statements: Statement[]
}

export interface Parameter {
  type: VariableType
  name: string
  line: number
}

export interface FunctionDecl extends NodeBase {
  kind: 'FunctionDecl'
  returnType: ReturnType
  name: string
  params: Parameter[]
  body: Block
}

export interface DeclStmt extends NodeBase {
  kind: 'DeclStmt'
  varType: VariableType
  name: string
  initializer: Expression | null
}

export interface AssignStmt extends NodeBase {
  kind: 'AssignStmt'
  name: string
  value: Expression
}

/**
 * if / elif 的一个分支
 */
export interface ConditionalBranch {
  condition: Expression
  body: Block
}

export interface IfStmt extends NodeBase {
  kind: 'IfStmt'
  branches: ConditionalBranch[] // 第一个为if，其后依次为elif
  elseBlock: Block | null
}

/**
 * 计数循环 loop from i [= start] to end [step s]，start 为 null 表示沿用已有变量
 */
export interface LoopStmt extends NodeBase {
  kind: 'LoopStmt'
  variable: string
  start: Expression | null
  end: Expression
  step: Expression | null
  body: Block
}

export interface ConditionalLoopStmt extends NodeBase {
  kind: 'ConditionalLoopStmt'
  condition: Expression
  body: Block
}

export interface PrintStmt extends NodeBase {
  kind: 'PrintStmt'
  expressions: Expression[]
}

export interface InputStmt extends NodeBase {
  kind: 'InputStmt'
  name: string
}

export interface ReturnStmt extends NodeBase {
  kind: 'ReturnStmt'
  value: Expression | null
}

export interface Block extends NodeBase {
  kind: 'Block'
  statements: Statement[]
}

export interface FunctionCall extends NodeBase {
  kind: 'FunctionCall'
  name: string
  args: Expression[]
}

export interface BinaryOp extends NodeBase {
  kind: 'BinaryOp'
  operator: BinaryOperator
  left: Expression
  right: Expression
}

export interface UnaryOp extends NodeBase {
  kind: 'UnaryOp'
  operator: UnaryOperator
  operand: Expression
}

export interface Identifier extends NodeBase {
  kind: 'Identifier'
  name: string
}

export interface Literal extends NodeBase {
  kind: 'Literal'
  valueType: VariableType
  value: string // 源码中的字面值，字符字面量不含引号
}

export type Statement =
  | DeclStmt
  | AssignStmt
  | IfStmt
  | LoopStmt
  | ConditionalLoopStmt
  | PrintStmt
  | InputStmt
  | ReturnStmt
  | Block
  | FunctionCall

export type Expression = BinaryOp | UnaryOp | Identifier | Literal | FunctionCall

export type SyntaxTreeNode = Program | FunctionDecl | Statement | Expression

/**
 * 以缩进文本形式输出语法树
 */
export function formatSyntaxTree(node: SyntaxTreeNode, depth: number = 0): string[] {
  const indent = '  '.repeat(depth)
  const children = (nodes: SyntaxTreeNode[]) => nodes.flatMap(child => formatSyntaxTree(child, depth + 1))

  switch (node.kind) {
    case 'Program':
      return [`${indent}Program`, ...children(node.functions), ...children(node.statements)]
    case 'FunctionDecl': {
      const params = node.params.map(param => `${param.type} ${param.name}`).join(', ')
      return [`${indent}FunctionDecl ${node.returnType} ${node.name}(${params})`, ...children([node.body])]
    }
    case 'DeclStmt':
      return [`${indent}DeclStmt ${node.varType} ${node.name}`, ...children(node.initializer ? [node.initializer] : [])]
    case 'AssignStmt':
      return [`${indent}AssignStmt ${node.name}`, ...children([node.value])]
    case 'IfStmt': {
      const lines = [`${indent}IfStmt`]
      node.branches.forEach((branch, index) => {
        lines.push(`${indent}  ${index === 0 ? 'if' : 'elif'}`)
        lines.push(...formatSyntaxTree(branch.condition, depth + 2), ...formatSyntaxTree(branch.body, depth + 2))
      })
      if (node.elseBlock) {
        lines.push(`${indent}  else`, ...formatSyntaxTree(node.elseBlock, depth + 2))
      }
      return lines
    }
    case 'LoopStmt': {
      const parts = [node.start, node.end, node.step].filter((part): part is Expression => part !== null)
      return [`${indent}LoopStmt ${node.variable}`, ...children([...parts, node.body])]
    }
    case 'ConditionalLoopStmt':
      return [`${indent}ConditionalLoopStmt`, ...children([node.condition, node.body])]
    case 'PrintStmt':
      return [`${indent}PrintStmt`, ...children(node.expressions)]
    case 'InputStmt':
      return [`${indent}InputStmt ${node.name}`]
    case 'ReturnStmt':
      return [`${indent}ReturnStmt`, ...children(node.value ? [node.value] : [])]
    case 'Block':
      return [`${indent}Block`, ...children(node.statements)]
    case 'FunctionCall':
      return [`${indent}FunctionCall ${node.name}`, ...children(node.args)]
    case 'BinaryOp':
      return [`${indent}BinaryOp ${node.operator}`, ...children([node.left, node.right])]
    case 'UnaryOp':
      return [`${indent}UnaryOp ${node.operator}`, ...children([node.operand])]
    case 'Identifier':
      return [`${indent}Identifier ${node.name}`]
    case 'Literal':
      return [`${indent}Literal ${node.valueType} ${node.value}`]
    default:
      return assertNever(node, 'formatSyntaxTree')
  }
}
