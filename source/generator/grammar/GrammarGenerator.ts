/**
 * 文法分析报告生成入口
 * 从文法文件生成各类文法的分析报告JSON文件
 */

import * as path from 'path'
import { GrammarFileParser } from './GrammarFileParser'
import { GrammarAnalyzer } from './GrammarAnalyzer'
import { GrammarClass } from './GrammarTypes'

/**
 * 从文法文件生成分析报告，每个类别一个文件：{输出目录}/{文件名}-{类别}.json
 * @param grammarFilePath 文法文件路径
 * @param grammarClasses 要分析的文法类别
 * @param outputDir 输出目录（可选，默认与文法文件同目录）
 */
export function generateGrammarReport(
  grammarFilePath: string,
  grammarClasses: readonly GrammarClass[],
  outputDir?: string
): GrammarAnalyzer[] {
  const baseName = path.basename(grammarFilePath, path.extname(grammarFilePath))
  const targetDir = outputDir ?? path.dirname(grammarFilePath)

  console.log(`[GrammarGenerator] 开始解析文法文件: ${grammarFilePath}`)
  const grammar = GrammarFileParser.fromFile(grammarFilePath).toGrammar()
  console.log(
    `[GrammarGenerator] 文法文件解析完成，发现 ${grammar.productions.length} 个产生式（含拓广产生式），` +
      `${grammar.terminals.length} 个终结符，${grammar.nonTerminals.length} 个非终结符`
  )

  const analyzers: GrammarAnalyzer[] = []
  for (const grammarClass of grammarClasses) {
    console.log(`[GrammarGenerator] 开始构建 ${grammarClass} 分析...`)
    const analyzer = new GrammarAnalyzer(grammar, grammarClass)
    console.log(`[GrammarGenerator] ${analyzer.summary()}`)
    for (const diagnostic of analyzer.sets.diagnostics) {
      console.log(`[GrammarGenerator] 警告：${diagnostic}`)
    }

    const description = `从 ${grammarFilePath} 生成 @ ${new Date().toLocaleDateString()}`
    analyzer.serialize(description, path.join(targetDir, `${baseName}-${grammarClass}.json`))
    analyzers.push(analyzer)
  }
  return analyzers
}
