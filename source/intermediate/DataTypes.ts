/**
 * 数据类型定义
 */

/**
 * 变量可声明的类型
 */
export type VariableType = 'int' | 'float' | 'char'

/**
 * 函数返回类型
 */
export type ReturnType = VariableType | 'void'

/**
 * 表达式可能的类型（bool 仅作为条件运算结果出现）
 */
export type DataType = ReturnType | 'bool'

/**
 * 各类型变量占用的存储字节数
 */
export const TYPE_SIZES: Readonly<Record<VariableType, number>> = {
  int: 4,
  float: 4,
  char: 1,
}

export function isNumericType(type: DataType): boolean {
  return type === 'int' || type === 'float'
}

/**
 * 可参与算术/比较的类型（char 提升为 int）
 */
export function isArithmeticType(type: DataType): boolean {
  return isNumericType(type) || type === 'char'
}

/**
 * 赋值兼容：类型相同总是兼容；int 可拓宽为 float；char 可拓宽为 int；其余均不兼容
 * @param target 被赋值一方的类型
 * @param source 值的类型
 */
export function isTypeCompatible(target: DataType, source: DataType): boolean {
  if (target === source) return true
  if (target === 'float' && source === 'int') return true
  if (target === 'int' && source === 'char') return true
  return false
}
