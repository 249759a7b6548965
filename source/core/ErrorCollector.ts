/**
 * 错误收集和报告模块
 */

import { CompilerError } from './utils'

/**
 * 错误类型（各编译阶段独立的错误通道）
 */
export enum ErrorType {
  LexicalError = '词法错误',
  SyntaxError = '语法错误',
  SemanticError = '语义错误',
}

export type ErrorSeverity = 'error' | 'warning'

/**
 * 扩展的编译器错误类，包含行号和位置信息
 */
export class DetailedCompilerError extends CompilerError {
  public readonly errorType: ErrorType
  public readonly lineNumber: number
  public readonly position: number
  public readonly severity: ErrorSeverity

  constructor(
    errorType: ErrorType,
    message: string,
    lineNumber: number = 0,
    position: number = 0,
    severity: ErrorSeverity = 'error'
  ) {
    super(message)
    this.errorType = errorType
    this.lineNumber = lineNumber
    this.position = position
    this.severity = severity
    this.name = 'DetailedCompilerError'
  }

  /**
   * 单行文本形式：[类型] 信息（行N，位置M）
   */
  format(): string {
    const location = this.lineNumber > 0 ? `行${this.lineNumber}` : ''
    const posInfo = this.position > 0 ? `，位置${this.position}` : ''
    const tag = this.severity === 'warning' ? `${this.errorType}·警告` : this.errorType
    return `[${tag}] ${this.message}${location ? `（${location}${posInfo}）` : ''}`
  }
}

/**
 * 错误收集器类
 * 各阶段只记录错误不抛出，阶段结束后由调用方决定是否继续
 */
export class ErrorCollector {
  private _errors: DetailedCompilerError[] = []

  /**
   * 添加错误
   */
  addError(error: DetailedCompilerError): void {
    this._errors.push(error)
  }

  /**
   * 添加词法错误
   */
  addLexicalError(message: string, lineNumber: number = 0, position: number = 0): void {
    this.addError(new DetailedCompilerError(ErrorType.LexicalError, message, lineNumber, position, 'error'))
  }

  /**
   * 添加语法错误
   */
  addSyntaxError(message: string, lineNumber: number = 0, position: number = 0): void {
    this.addError(new DetailedCompilerError(ErrorType.SyntaxError, message, lineNumber, position, 'error'))
  }

  /**
   * 添加语义错误
   */
  addSemanticError(message: string, lineNumber: number = 0, position: number = 0): void {
    this.addError(new DetailedCompilerError(ErrorType.SemanticError, message, lineNumber, position, 'error'))
  }

  /**
   * 添加警告（不影响hasErrors）
   */
  addWarning(errorType: ErrorType, message: string, lineNumber: number = 0, position: number = 0): void {
    this.addError(new DetailedCompilerError(errorType, message, lineNumber, position, 'warning'))
  }

  /**
   * 检查是否有错误
   */
  hasErrors(): boolean {
    return this._errors.some(error => error.severity === 'error')
  }

  /**
   * 检查某一通道是否有错误
   */
  hasErrorsOfType(errorType: ErrorType): boolean {
    return this._errors.some(error => error.severity === 'error' && error.errorType === errorType)
  }

  /**
   * 获取所有错误
   */
  getErrors(): DetailedCompilerError[] {
    return [...this._errors]
  }

  /**
   * 获取某一通道的错误
   */
  getErrorsOfType(errorType: ErrorType): DetailedCompilerError[] {
    return this._errors.filter(error => error.errorType === errorType)
  }

  /**
   * 获取错误数量
   */
  getErrorCount(): number {
    return this._errors.length
  }

  /**
   * 按行号、位置排序后的文本
   */
  formatErrors(): string[] {
    return [...this._errors]
      .sort((a, b) => {
        if (a.lineNumber !== b.lineNumber) {
          return a.lineNumber - b.lineNumber
        }
        return a.position - b.position
      })
      .map(error => error.format())
  }

  /**
   * 报告所有错误
   */
  reportErrors(): void {
    if (this._errors.length === 0) {
      return
    }

    console.error(`\n[编译错误] 共发现 ${this._errors.length} 个错误：\n`)
    for (const line of this.formatErrors()) {
      console.error(line)
    }
    console.error('')
  }

  /**
   * 清空所有错误
   */
  clear(): void {
    this._errors = []
  }
}
