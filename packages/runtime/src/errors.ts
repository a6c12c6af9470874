/**
 * persona-desk カスタムエラー
 */

import type { LLMProvider } from '@persona-desk/persona-spec';

/**
 * ベースエラー
 */
export class PersonaDeskError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'PersonaDeskError';
  }
}

/**
 * 設定エラー
 */
export class ConfigError extends PersonaDeskError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * 入力検証エラー
 */
export class ValidationError extends PersonaDeskError {
  constructor(public readonly errors: string[]) {
    super(`Validation failed: ${errors.join('; ')}`, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * 未対応の種類（評価フレームワーク等）
 */
export class UnsupportedTypeError extends PersonaDeskError {
  constructor(
    public readonly kind: string,
    public readonly value: string,
    public readonly supported: readonly string[]
  ) {
    super(`Unsupported ${kind}: ${value} (supported: ${supported.join(', ')})`, 'UNSUPPORTED_TYPE');
    this.name = 'UnsupportedTypeError';
  }
}

/**
 * LLMプロバイダー呼び出しエラー
 */
export class LLMProviderError extends PersonaDeskError {
  constructor(
    public readonly provider: LLMProvider,
    public readonly model: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${provider} (${model}) request failed: ${message}`, 'LLM_PROVIDER_ERROR');
    this.name = 'LLMProviderError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * テンプレートが見つからない
 */
export class TemplateNotFoundError extends PersonaDeskError {
  constructor(public readonly templateName: string) {
    super(`Template not found: ${templateName}`, 'TEMPLATE_NOT_FOUND');
    this.name = 'TemplateNotFoundError';
  }
}

/**
 * テンプレート描画エラー
 */
export class TemplateRenderError extends PersonaDeskError {
  constructor(templateName: string, message: string) {
    super(`Failed to render template ${templateName}: ${message}`, 'TEMPLATE_RENDER_ERROR');
    this.name = 'TemplateRenderError';
  }
}

/**
 * 入力ファイル読み込みエラー
 */
export class InputFileError extends PersonaDeskError {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(`Failed to read ${filePath}: ${message}`, 'INPUT_FILE_ERROR');
    this.name = 'InputFileError';
  }
}

/**
 * zod の issue を表示用文字列に変換
 */
export function formatIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string[] {
  return issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}
