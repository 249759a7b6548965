/**
 * toylang编译器主入口文件
 * 用法: node main.js <source_file> [options]
 * 选项:
 *   -o <output_path>  指定输出路径
 *   -i                一并输出符号表与语法树
 *   -O                输出优化后的三地址码
 *   --run             用解释器执行三地址码
 *   --input <a,b,..>  tell 语句依次读取的输入
 *   -v                显示编译过程详细信息
 */

import * as path from 'path'
import * as fs from 'fs'
import minimist from 'minimist'
import { requireCondition, CompilerError } from './core/utils'
import { compileSource } from './Compiler'
import { formatSyntaxTree } from './intermediate/SyntaxTreeNode'
import { formatInstructions } from './intermediate_code/InstructionQuad'
import { interpretInstructions } from './interpreter/TacInterpreter'

const args = minimist(process.argv.slice(2), { string: ['o', 'input'], boolean: ['i', 'O', 'run', 'v'] })

const withListing = Boolean(args.i)
const optimize = Boolean(args.O)
const verbose = Boolean(args.v)

// 输出函数
const print = (message: string) => {
  if (verbose) {
    console.log(message)
  }
}

try {
  requireCondition(
    args._.length === 1,
    '[用法]: node main.js <source_file> [-o <output_path>] [-i] [-O] [--run] [--input a,b] [-v]'
  )

  // 整理参数
  const codePath = args._[0]
  const outputPath = typeof args.o === 'string' && args.o.length > 0 ? args.o : path.dirname(codePath)
  const outputName = path.basename(codePath, path.extname(codePath))
  const input = typeof args.input === 'string' && args.input.length > 0 ? args.input.split(',') : []
  const startTime = new Date().getTime()

  print('====================================')
  print('  ===== [toylang-compiler] =====')
  print('====================================')
  print('')
  print('*** 基本信息 ***')
  print(`  源文件: ${codePath}`)
  print(`  输出路径: ${outputPath}`)
  print(`  输出符号表与语法树: ${String(withListing)}`)
  print(`  优化: ${String(optimize)}`)
  print('')

  print('  读取源文件...')
  requireCondition(fs.existsSync(codePath), `找不到源文件: ${codePath}`)
  const sourceCode = fs.readFileSync(codePath, 'utf-8')
  requireCondition(sourceCode.trim().length > 0, '源文件为空!')

  print('  开始编译...')
  const result = compileSource(sourceCode, { optimize })
  print(`  词法分析完成。获得 ${result.tokens.length} 个Token。`)
  if (!result.success) {
    result.errorCollector.reportErrors()
    process.exit(1)
  }
  for (const warning of result.errorCollector.formatErrors()) {
    console.error(warning)
  }
  print(`  三地址码生成完成，共 ${result.instructions.length} 条指令。`)

  // 输出
  if (!fs.existsSync(outputPath)) {
    fs.mkdirSync(outputPath, { recursive: true })
  }
  const tacFile = path.join(outputPath, outputName + '.tac')
  fs.writeFileSync(tacFile, formatInstructions(result.instructions).join('\n') + '\n')
  print(`  三地址码已输出: ${tacFile}`)

  if (result.optimizedInstructions) {
    const optimizedFile = path.join(outputPath, outputName + '.opt.tac')
    fs.writeFileSync(optimizedFile, formatInstructions(result.optimizedInstructions).join('\n') + '\n')
    print(`  优化后三地址码已输出: ${optimizedFile}（${result.instructions.length} → ${result.optimizedInstructions.length} 条）`)
  }

  if (withListing && result.program && result.semantic) {
    const symbolFile = path.join(outputPath, outputName + '.symbols.txt')
    fs.writeFileSync(symbolFile, result.semantic.symbolTable.toTableString() + '\n')
    const astFile = path.join(outputPath, outputName + '.ast.txt')
    fs.writeFileSync(astFile, formatSyntaxTree(result.program).join('\n') + '\n')
    print(`  符号表已输出: ${symbolFile}`)
    print(`  语法树已输出: ${astFile}`)
  }

  if (Boolean(args.run)) {
    print('  开始执行...')
    const output = interpretInstructions(result.optimizedInstructions ?? result.instructions, { input })
    for (const line of output) {
      console.log(line)
    }
  }

  const endTime = new Date().getTime()
  print('')
  print('*** 总结 ***')
  print(`  编译成功完成，耗时 ${((endTime - startTime) / 1000).toFixed(2)} 秒。`)
} catch (ex) {
  if (ex instanceof CompilerError) {
    console.error(`[编译错误] ${ex.message}`)
    process.exit(1)
  } else {
    throw ex
  }
}
