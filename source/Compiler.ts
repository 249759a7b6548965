/**
 * 编译流水线：词法分析 → 语法分析 → 语义分析 → 三地址码生成（→ 优化）
 * 任一阶段记录了错误即停止，后续阶段的产物为空
 */

import { ErrorCollector } from './core/ErrorCollector'
import { Program } from './intermediate/SyntaxTreeNode'
import { InstructionQuad } from './intermediate_code/InstructionQuad'
import { generateIntermediateCode } from './intermediate_code/IntermediateCodeGenerator'
import { optimizeInstructions } from './optimizer/TacOptimizer'
import { SemanticResult, analyzeProgram } from './semantic_analyzer/SemanticAnalyzer'
import { parseTokenSequence } from './syntax_analyzer/SyntaxAnalyzer'
import { Token } from './tokenizer/Token'
import { tokenizeSourceCode } from './tokenizer/Tokenizer'

export interface CompileOptions {
  optimize?: boolean
}

export interface CompilationResult {
  tokens: Token[]
  program: Program | null
  semantic: SemanticResult | null
  instructions: InstructionQuad[]
  optimizedInstructions: InstructionQuad[] | null // 仅在要求优化时生成
  errorCollector: ErrorCollector
  success: boolean
}

export function compileSource(source: string, options: CompileOptions = {}): CompilationResult {
  const errorCollector = new ErrorCollector()
  const result: CompilationResult = {
    tokens: [],
    program: null,
    semantic: null,
    instructions: [],
    optimizedInstructions: null,
    errorCollector,
    success: false,
  }

  result.tokens = tokenizeSourceCode(source, errorCollector)
  if (errorCollector.hasErrors()) return result

  const program = parseTokenSequence(result.tokens, errorCollector)
  result.program = program
  if (errorCollector.hasErrors()) return result

  const semantic = analyzeProgram(program, errorCollector)
  result.semantic = semantic
  if (errorCollector.hasErrors()) return result

  result.instructions = generateIntermediateCode(program, semantic.annotations)
  if (options.optimize) {
    result.optimizedInstructions = optimizeInstructions(result.instructions)
  }
  result.success = true
  return result
}
