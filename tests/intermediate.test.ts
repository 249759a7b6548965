import { ErrorCollector } from '../source/core/ErrorCollector'
import { CompilerError } from '../source/core/utils'
import { InstructionQuad, formatInstructions, parseInstructionText } from '../source/intermediate_code/InstructionQuad'
import { IntermediateCodeGenerator } from '../source/intermediate_code/IntermediateCodeGenerator'
import { analyzeProgram } from '../source/semantic_analyzer/SemanticAnalyzer'
import { parseTokenSequence } from '../source/syntax_analyzer/SyntaxAnalyzer'
import { tokenizeSourceCode } from '../source/tokenizer/Tokenizer'

const lower = (source: string): string[] => {
  const errors = new ErrorCollector()
  const program = parseTokenSequence(tokenizeSourceCode(source, errors), errors)
  const { annotations } = analyzeProgram(program, errors)
  expect(errors.getErrors()).toHaveLength(0)
  return formatInstructions(new IntermediateCodeGenerator(program, annotations).instructionList)
}

describe('IntermediateCodeGenerator', () => {
  it('lowers a declaration, an assignment and show', () => {
    expect(lower('int x; x = 5 + 3; show x;')).toEqual(['MAIN:', 'ALLOC x int', 't0 = 5 + 3', 'x = t0', 'PRINT x', 'END_MAIN'])
  })

  it('lowers unary minus and char literals', () => {
    expect(lower("int n = -5; char c = 'q'; show c;")).toEqual([
      'MAIN:',
      'ALLOC n int',
      't0 = -5',
      'n = t0',
      'ALLOC c char',
      "c = 'q'",
      'PRINT c',
      'END_MAIN',
    ])
  })

  it('lowers if, elif and else to conditional jumps', () => {
    expect(lower('int a = 1; if (a > 0) { show 1; } elif (a < 0) { show 2; } else { show 3; }')).toEqual([
      'MAIN:',
      'ALLOC a int',
      'a = 1',
      't0 = a > 0',
      'IF_FALSE t0 GOTO L0',
      'ENTER_SCOPE',
      'PRINT 1',
      'EXIT_SCOPE',
      'GOTO L2',
      'L0:',
      't1 = a < 0',
      'IF_FALSE t1 GOTO L1',
      'ENTER_SCOPE',
      'PRINT 2',
      'EXIT_SCOPE',
      'GOTO L2',
      'L1:',
      'ENTER_SCOPE',
      'PRINT 3',
      'EXIT_SCOPE',
      'L2:',
      'END_MAIN',
    ])
  })

  it('allocates an implicitly declared range loop variable', () => {
    expect(lower('loop from i = 1 to 3 { show i; }')).toEqual([
      'MAIN:',
      'ALLOC i int',
      'i = 1',
      'L0:',
      't0 = i <= 3',
      'IF_FALSE t0 GOTO L1',
      'ENTER_SCOPE',
      'PRINT i',
      'EXIT_SCOPE',
      't1 = i + 1',
      'i = t1',
      'GOTO L0',
      'L1:',
      'END_MAIN',
    ])
  })

  it('lowers a conditional loop', () => {
    expect(lower('int k = 0; loop (k < 2) { k = k + 1; }')).toEqual([
      'MAIN:',
      'ALLOC k int',
      'k = 0',
      'L0:',
      't0 = k < 2',
      'IF_FALSE t0 GOTO L1',
      'ENTER_SCOPE',
      't1 = k + 1',
      'k = t1',
      'EXIT_SCOPE',
      'GOTO L0',
      'L1:',
      'END_MAIN',
    ])
  })

  it('lowers functions before the main program and pushes arguments right to left', () => {
    expect(lower('func int add(int a, int b) { return a + b; } show add(2, 3);')).toEqual([
      'FUNC_add:',
      'PARAM a 0',
      'PARAM b 1',
      'ENTER_SCOPE',
      't0 = a + b',
      'RETURN t0',
      'EXIT_SCOPE',
      'RETURN 0',
      'END_FUNC_add',
      'MAIN:',
      'PUSH 3',
      'PUSH 2',
      'CALL FUNC_add 2',
      't1 = RETVAL',
      'PRINT t1',
      'END_MAIN',
    ])
  })

  it('keeps counters per generator instance', () => {
    const source = 'int x = 1 + 2; show x;'
    expect(lower(source)).toEqual(lower(source))
  })
})

describe('InstructionQuad', () => {
  it('reads the text format back into instructions', () => {
    const text = lower("func int f(int a) { return -a; } char c = ' '; show f(1), c;").join('\n')
    const parsed = parseInstructionText(text + '\n\n')
    expect(formatInstructions(parsed).join('\n')).toBe(text)
    expect(parsed.find(instruction => instruction.operation === 'NEG')).toMatchObject({ operand1: 'a', result: 't0' })
  })

  it('parses each instruction kind', () => {
    expect(InstructionQuad.parse('IF_FALSE t3 GOTO L7')).toMatchObject({ operation: 'IF_FALSE', operand1: 't3', result: 'L7' })
    expect(InstructionQuad.parse('t2 = a >= b')).toMatchObject({ operation: '>=', operand1: 'a', operand2: 'b', result: 't2' })
    expect(InstructionQuad.parse('t4 = !t3')).toMatchObject({ operation: 'NOT', operand1: 't3', result: 't4' })
    expect(InstructionQuad.parse('RETURN')).toMatchObject({ operation: 'RETURN', operand1: '' })
    expect(InstructionQuad.parse('READ v')).toMatchObject({ operation: 'READ', result: 'v' })
  })

  it('rejects malformed lines', () => {
    expect(() => InstructionQuad.parse('t0 = a ^ b')).toThrow(CompilerError)
    expect(() => InstructionQuad.parse('GOTO')).toThrow('无法解析的三地址码: GOTO')
  })
})
