import { compileSource } from '../source/Compiler'
import { formatInstructions, parseInstructionText } from '../source/intermediate_code/InstructionQuad'
import { interpretInstructions } from '../source/interpreter/TacInterpreter'
import { constantType, foldBinary, optimizeInstructions, simplifyAlgebraic } from '../source/optimizer/TacOptimizer'

const optimized = (source: string): string[] => {
  const result = compileSource(source, { optimize: true })
  expect(result.success).toBe(true)
  return formatInstructions(result.optimizedInstructions ?? [])
}

describe('TacOptimizer', () => {
  it('folds a constant expression into the assignment', () => {
    expect(optimized('int x; x = 5 + 3; show x;')).toEqual(['MAIN:', 'ALLOC x int', 'x = 8', 'PRINT x', 'END_MAIN'])
  })

  it('propagates folded temporaries through nested expressions', () => {
    expect(optimized('int y = 2 * 3 + 4;')).toEqual(['MAIN:', 'ALLOC y int', 'y = 10', 'END_MAIN'])
  })

  it('simplifies multiplication by one and addition of zero', () => {
    expect(optimized('int a = 3; int b = a * 1 + 0;')).toEqual(['MAIN:', 'ALLOC a int', 'a = 3', 'ALLOC b int', 't0 = a', 'b = t0', 'END_MAIN'])
  })

  it('simplifies multiplication by zero', () => {
    expect(optimized('int a = 3; int c = a * 0;')).toEqual(['MAIN:', 'ALLOC a int', 'a = 3', 'ALLOC c int', 'c = 0', 'END_MAIN'])
  })

  it('keeps scope markers and calls while dropping unused results', () => {
    expect(optimized('func int f() { return 1; } f();')).toEqual([
      'FUNC_f:',
      'ENTER_SCOPE',
      'RETURN 1',
      'EXIT_SCOPE',
      'RETURN 0',
      'END_FUNC_f',
      'MAIN:',
      'CALL FUNC_f 0',
      'END_MAIN',
    ])
  })

  it('keeps identity operations on char operands', () => {
    expect(optimized("char c = 'a'; show c * 1;")).toEqual(['MAIN:', 'ALLOC c char', "c = 'a'", 't0 = c * 1', 'PRINT t0', 'END_MAIN'])
  })

  it('prints the same output with and without optimization', () => {
    const sources = [
      "char c = 'a'; show c * 1, c + 0, 0 + c, c - 0, 1 * c;",
      'float g = 7.0; int i = 7; show (g * 0 + 7) / 2, (g * 1) / 2, (i * 1) / 2, 0 * g;',
    ]
    for (const source of sources) {
      const result = compileSource(source, { optimize: true })
      const plain = interpretInstructions(result.instructions)
      expect(interpretInstructions(result.optimizedInstructions ?? [])).toEqual(plain)
    }
    expect(interpretInstructions(compileSource(sources[0]).instructions)).toEqual(['97', '97', '97', '97', '97'])
    expect(interpretInstructions(compileSource(sources[1]).instructions)).toEqual(['3.5', '3.5', '3', '0'])
  })

  it('does not fold a division by zero', () => {
    expect(optimized('int q = 1 / 0;')).toEqual(['MAIN:', 'ALLOC q int', 't0 = 1 / 0', 'q = t0', 'END_MAIN'])
  })

  it('treats declared variables named like temporaries as variables', () => {
    const instructions = parseInstructionText('MAIN:\nALLOC t5 int\nt5 = 4\nEND_MAIN')
    expect(formatInstructions(optimizeInstructions(instructions))).toEqual(['MAIN:', 'ALLOC t5 int', 't5 = 4', 'END_MAIN'])
  })
})

describe('constant folding helpers', () => {
  it('truncates integer division and keeps floats', () => {
    expect(foldBinary('/', '7', '2')).toBe('3')
    expect(foldBinary('/', '-7', '2')).toBe('-3')
    expect(foldBinary('+', '1.5', '1.5')).toBe('3.0')
    expect(foldBinary('%', '7', '0')).toBeNull()
  })

  it('evaluates comparisons and logic to 1 or 0', () => {
    expect(foldBinary('<', '1', '2')).toBe('1')
    expect(foldBinary('==', '2', '2.0')).toBe('1')
    expect(foldBinary('&&', '1', '0')).toBe('0')
    expect(foldBinary('||', '0', '3')).toBe('1')
  })

  it('leaves expressions without an identity operand alone', () => {
    expect(simplifyAlgebraic('-', '0', 'x', 'int', 'int')).toBeNull()
    expect(simplifyAlgebraic('+', '0', 'x', 'int', 'int')).toBe('x')
    expect(simplifyAlgebraic('/', 'x', '1', 'int', 'int')).toBeNull()
  })

  it('simplifies only numeric operands', () => {
    expect(simplifyAlgebraic('*', 'c', '1', 'char', 'int')).toBeNull()
    expect(simplifyAlgebraic('+', 'x', '0', null, 'int')).toBeNull()
    expect(simplifyAlgebraic('*', 'x', '0', 'float', 'int')).toBe('0.0')
    expect(simplifyAlgebraic('*', '0', 'x', 'int', 'int')).toBe('0')
  })

  it('types constants by their form', () => {
    expect(constantType("'a'")).toBe('char')
    expect(constantType('2.5')).toBe('float')
    expect(constantType('-3')).toBe('int')
    expect(constantType('x')).toBeNull()
  })
})
