/**
 * 核心工具函数模块
 */

// FOLLOW集不动点迭代的最大轮数
export const MAX_FOLLOW_ITERATIONS = 100

// 解释器执行指令的最大步数
export const MAX_INTERPRETER_STEPS = 100000

export class CompilerError extends Error {}

/**
 * 断言函数，如果条件为假则抛出错误
 */
export function requireCondition(condition: unknown, message: string): asserts condition {
  if (!condition) throw new CompilerError(message)
}

/**
 * 穷尽性检查，联合类型新增成员而未处理时编译期报错
 */
export function assertNever(value: never, context: string): never {
  throw new CompilerError(`${context}：未处理的分支 ${JSON.stringify(value)}`)
}

/**
 * 检查字符是否为英文字母
 */
export function isLetter(ch: string): boolean {
  return ch.length === 1 && /[A-Za-z]/.test(ch)
}

/**
 * 检查字符是否为十进制数字
 */
export function isDigit(ch: string): boolean {
  return ch.length === 1 && ch >= '0' && ch <= '9'
}

/**
 * 字符串比较（按UTF-16码元），用于所有需要确定顺序的排序
 */
export function compareStrings(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}

/**
 * 返回排序后的集合元素
 */
export function sortedValues(values: Iterable<string>): string[] {
  return [...values].sort(compareStrings)
}
