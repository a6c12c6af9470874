/**
 * 生成物の保存先
 *
 * <outputDir>/<category>/<filename> に UTF-8 で書き出す
 */

import * as fs from 'fs';
import * as path from 'path';
import type { AgentLogger } from '@persona-desk/persona-spec';

export type OutputCategory =
  | 'documents'
  | 'meetings'
  | 'assessments'
  | 'consultations'
  | 'proposals'
  | 'analyses'
  | 'decisions';

/**
 * ファイル名に使えない区切り（空白・スラッシュ）を置換
 */
export function safeFileSegment(value: string): string {
  return value.replace(/[\s/\\]/g, '_');
}

export class OutputStore {
  constructor(
    private readonly outputDir: string,
    private readonly logger?: AgentLogger
  ) {}

  /**
   * 保存して絶対パスを返す
   */
  save(category: OutputCategory, filename: string, content: string): string {
    const directory = path.join(this.outputDir, category);
    fs.mkdirSync(directory, { recursive: true });

    const filePath = path.join(directory, safeFileSegment(filename));
    fs.writeFileSync(filePath, content, 'utf-8');
    this.logger?.info('Output saved', { category, path: filePath });
    return filePath;
  }
}
