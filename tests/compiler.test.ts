import { compileSource } from '../source/Compiler'
import { ErrorType } from '../source/core/ErrorCollector'

describe('compileSource', () => {
  it('produces instructions only when every phase succeeds', () => {
    const result = compileSource('int x = 2; show x;')
    expect(result.success).toBe(true)
    expect(result.instructions.map(instruction => instruction.toString())).toEqual([
      'MAIN:',
      'ALLOC x int',
      'x = 2',
      'PRINT x',
      'END_MAIN',
    ])
    expect(result.optimizedInstructions).toBeNull()
  })

  it('still compiles when only warnings were recorded', () => {
    const result = compileSource('func int f() { return 1; show 2; } show f();')
    expect(result.success).toBe(true)
    expect(result.errorCollector.getErrorCount()).toBe(1)
    expect(result.instructions.map(instruction => instruction.toString())).toContain('PRINT 2')
  })

  it('stops after lexical errors', () => {
    const result = compileSource('int x = 1 @ 2;')
    expect(result.success).toBe(false)
    expect(result.errorCollector.hasErrorsOfType(ErrorType.LexicalError)).toBe(true)
    expect(result.program).toBeNull()
    expect(result.instructions).toEqual([])
  })

  it('stops after semantic errors with the tree kept', () => {
    const result = compileSource('y = 3;')
    expect(result.success).toBe(false)
    expect(result.errorCollector.getErrorCount()).toBe(1)
    expect(result.errorCollector.getErrorsOfType(ErrorType.SemanticError)[0].message).toContain('变量 y 未声明')
    expect(result.program).not.toBeNull()
    expect(result.instructions).toEqual([])
  })
})
