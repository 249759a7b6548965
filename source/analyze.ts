/**
 * 文法分析工具入口
 * 用法: node analyze.js <grammar_file> [options]
 * 选项:
 *   -c <class>   文法类别：lr0 | slr1 | clr1 | lalr1 | ll1 | all（默认all）
 *   -o <dir>     报告输出目录（默认与文法文件同目录）
 */

import minimist from 'minimist'
import { CompilerError, requireCondition } from './core/utils'
import { generateGrammarReport } from './generator/grammar/GrammarGenerator'
import { ALL_GRAMMAR_CLASSES, GrammarClass } from './generator/grammar/GrammarTypes'

function parseGrammarClasses(value: unknown): readonly GrammarClass[] {
  if (value === undefined || value === 'all') return ALL_GRAMMAR_CLASSES
  const matched = ALL_GRAMMAR_CLASSES.find(grammarClass => grammarClass === value)
  requireCondition(matched !== undefined, `未知的文法类别: ${String(value)}，可选 ${ALL_GRAMMAR_CLASSES.join(' | ')} | all`)
  return [matched]
}

const args = minimist(process.argv.slice(2), { string: ['c', 'o'] })

try {
  requireCondition(args._.length === 1, '[用法]: node analyze.js <grammar_file> [-c lr0|slr1|clr1|lalr1|ll1|all] [-o <output_dir>]')

  const grammarClasses = parseGrammarClasses(args.c)
  const analyzers = generateGrammarReport(args._[0], grammarClasses, typeof args.o === 'string' ? args.o : undefined)
  const failed = analyzers.filter(analyzer => !analyzer.belongsToClass)
  if (failed.length > 0) {
    console.log(`[GrammarGenerator] 存在冲突的类别: ${failed.map(analyzer => analyzer.grammarClass).join(', ')}`)
  }
} catch (ex) {
  if (ex instanceof CompilerError) {
    console.error(`[文法错误] ${ex.message}`)
    process.exit(1)
  } else {
    throw ex
  }
}
