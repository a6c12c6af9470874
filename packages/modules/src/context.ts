/**
 * モジュール共通の依存
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import type { AgentConfig, AgentLogger, TextGenerator } from '@persona-desk/persona-spec';
import {
  OutputStore,
  TemplateEngine,
  fileStamp,
  formatJapaneseDateTime,
  type OutputCategory,
} from '@persona-desk/runtime';

/**
 * 保存用レコードテンプレートの同梱ディレクトリ
 */
export const RECORD_TEMPLATE_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../templates/records');

export interface ModuleContext {
  config: AgentConfig;
  llm: TextGenerator;
  logger: AgentLogger;
  output: OutputStore;
  /** レコード（保存用 Markdown）テンプレート */
  records: TemplateEngine;
  now: () => Date;
}

export interface ModuleContextOptions {
  config: AgentConfig;
  llm: TextGenerator;
  logger: AgentLogger;
  now?: () => Date;
}

export function createModuleContext(options: ModuleContextOptions): ModuleContext {
  return {
    config: options.config,
    llm: options.llm,
    logger: options.logger,
    output: new OutputStore(options.config.output_dir, options.logger.child({ component: 'output' })),
    // 利用者のテンプレートディレクトリを優先
    records: new TemplateEngine([path.join(options.config.template_dir, 'records'), RECORD_TEMPLATE_DIR], {
      trimBlocks: true,
    }),
    now: options.now ?? (() => new Date()),
  };
}

/**
 * 各モジュールの基底
 */
export abstract class PersonaModule {
  protected readonly logger: AgentLogger;

  constructor(
    protected readonly ctx: ModuleContext,
    component: string
  ) {
    this.logger = ctx.logger.child({ component });
  }

  protected get personaName(): string {
    return this.ctx.config.personality.name;
  }

  /**
   * レコードテンプレートを描画して保存
   */
  protected saveRecord(
    category: OutputCategory,
    filename: string,
    template: string,
    context: Record<string, unknown>
  ): string {
    const now = this.ctx.now();
    const content = this.ctx.records.render(`${template}.md`, {
      persona: this.personaName,
      datetime: formatJapaneseDateTime(now),
      ...context,
    });
    return this.ctx.output.save(category, `${filename}_${fileStamp(now)}.md`, content);
  }
}
