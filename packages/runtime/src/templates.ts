/**
 * Markdown テンプレートエンジン（Nunjucks）
 *
 * 出力は Markdown のため autoescape は無効
 */

import * as fs from 'fs';
import * as path from 'path';
import nunjucks from 'nunjucks';
import { glob } from 'glob';
import { TemplateNotFoundError, TemplateRenderError } from './errors';

export const TEMPLATE_EXTENSION = '.md';

export interface TemplateEngineOptions {
  /**
   * ブロックタグ行の改行と行頭空白を除く（既定 false: 書いたとおりの空白を残す）
   */
  trimBlocks?: boolean;
}

export class TemplateEngine {
  private readonly env: nunjucks.Environment;

  constructor(
    private readonly searchPaths: string[],
    options: TemplateEngineOptions = {}
  ) {
    const trim = options.trimBlocks ?? false;
    this.env = new nunjucks.Environment(new nunjucks.FileSystemLoader(searchPaths, { noCache: true }), {
      autoescape: false,
      trimBlocks: trim,
      lstripBlocks: trim,
    });
  }

  /**
   * テンプレートの絶対パス（見つからなければ null）
   */
  resolve(name: string): string | null {
    for (const dir of this.searchPaths) {
      const candidate = path.join(dir, name);
      if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
        return candidate;
      }
    }
    return null;
  }

  has(name: string): boolean {
    return this.resolve(name) !== null;
  }

  render(name: string, context: Record<string, unknown>): string {
    if (!this.has(name)) {
      throw new TemplateNotFoundError(name);
    }
    try {
      return this.env.render(name, context);
    } catch (error) {
      throw new TemplateRenderError(name, error instanceof Error ? error.message : String(error));
    }
  }

  renderString(source: string, context: Record<string, unknown>, name = '(inline)'): string {
    try {
      return this.env.renderString(source, context);
    } catch (error) {
      throw new TemplateRenderError(name, error instanceof Error ? error.message : String(error));
    }
  }

  /**
   * 検索パス内の *.md のファイル名（拡張子なし、ソート済み、重複なし）
   */
  async list(): Promise<string[]> {
    const names = new Set<string>();
    for (const dir of this.searchPaths) {
      const files = await glob(`*${TEMPLATE_EXTENSION}`, { cwd: dir, nodir: true });
      for (const file of files) {
        names.add(path.basename(file, TEMPLATE_EXTENSION));
      }
    }
    return [...names].sort();
  }
}
