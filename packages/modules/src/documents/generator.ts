/**
 * 文書生成
 *
 * <document_templates>/<docType>.md があればテンプレートに LLM 生成セクションを埋め込み、
 * なければ文書全体を LLM に作成させる
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import {
  TemplateEngine,
  TemplateRenderError,
  ValidationError,
  fileStamp,
  formatIssues,
  formatJapaneseDate,
} from '@persona-desk/runtime';
import { PersonaModule, type ModuleContext } from '../context';
import { formatRequirements } from '../format';

/**
 * 文書種別の日本語名
 */
export const DOCUMENT_TYPE_NAMES: Readonly<Record<string, string>> = {
  proposal: '提案書',
  report: '報告書',
  memo: 'メモ・連絡事項',
  meeting_minutes: '議事録',
  strategy: '戦略文書',
  plan: '計画書',
  analysis: '分析レポート',
  presentation: 'プレゼンテーション資料',
};

/**
 * 要件のうち生成器が解釈するキー（他のキーはそのままテンプレート変数）
 */
export const DocumentRequirementsSchema = z
  .object({
    content_sections: z.array(z.string().min(1)).optional(),
    section_requirements: z.record(z.string()).optional(),
  })
  .passthrough();

export type DocumentRequirements = z.infer<typeof DocumentRequirementsSchema>;

const DOC_TYPE_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * セクション名からテンプレート変数名へ
 */
export function sectionVariableName(section: string): string {
  return `section_${section.toLowerCase().replace(/ /g, '_')}`;
}

export class DocumentGenerator extends PersonaModule {
  private readonly templates: TemplateEngine;

  constructor(ctx: ModuleContext) {
    super(ctx, 'documents');
    this.templates = new TemplateEngine([ctx.config.document_templates]);
  }

  async generateDocument(docType: string, topic: string, requirements: Record<string, unknown> = {}): Promise<string> {
    const parsed = DocumentRequirementsSchema.safeParse(requirements);
    if (!parsed.success) {
      throw new ValidationError(formatIssues(parsed.error.issues));
    }

    const templateName = `${docType}.md`;
    let content: string;

    if (this.templates.has(templateName)) {
      try {
        content = await this.generateWithTemplate(templateName, topic, parsed.data);
      } catch (error) {
        if (!(error instanceof TemplateRenderError)) {
          throw error;
        }
        this.logger.warn('Template render failed, falling back to AI generation', {
          template: templateName,
          error: error.message,
        });
        content = await this.generateWithAI(docType, topic, parsed.data);
      }
    } else {
      content = await this.generateWithAI(docType, topic, parsed.data);
    }

    const savedPath = this.ctx.output.save('documents', `${docType}_${topic}_${fileStamp(this.ctx.now())}.md`, content);
    this.logger.info('Document generated', { doc_type: docType, path: savedPath });
    return content;
  }

  private async generateWithTemplate(
    templateName: string,
    topic: string,
    requirements: DocumentRequirements
  ): Promise<string> {
    const variables: Record<string, unknown> = {
      topic,
      date: formatJapaneseDate(this.ctx.now()),
      author: this.personaName,
      ...requirements,
    };

    for (const section of requirements.content_sections ?? []) {
      const guidance = requirements.section_requirements?.[section] ?? '';
      const prompt = `${topic}について、次のセクションの本文を書いてください。

セクション名: ${section}
要件: ${guidance}

${this.personaName}として、実務で使える具体的な内容にしてください。`;

      variables[sectionVariableName(section)] = await this.ctx.llm.generateResponse(prompt);
    }

    return this.templates.render(templateName, variables);
  }

  private async generateWithAI(docType: string, topic: string, requirements: DocumentRequirements): Promise<string> {
    const typeName = DOCUMENT_TYPE_NAMES[docType] ?? docType;
    const date = formatJapaneseDate(this.ctx.now());

    const prompt = `${typeName}の文書を作成してください。

【文書情報】
- 種類: ${typeName}
- テーマ: ${topic}
- 作成者: ${this.personaName}
- 作成日: ${date}

【要件】
${formatRequirements(requirements)}

【作成方針】
- 読み手が迷わない構成にする
- 行動につながる具体的な内容にする
- 根拠を示して説明する

次の構成で作成してください：

# ${topic}

## 概要

## 背景・目的

## 内容詳細

## 結論・提案

## 次のステップ

---
作成者: ${this.personaName}
作成日: ${date}`;

    return this.ctx.llm.generateResponse(prompt);
  }

  /**
   * 文書テンプレートを作成（上書き）
   */
  createTemplate(docType: string, content: string): string {
    if (!DOC_TYPE_PATTERN.test(docType)) {
      throw new ValidationError([`docType: must match ${DOC_TYPE_PATTERN.source}`]);
    }

    fs.mkdirSync(this.ctx.config.document_templates, { recursive: true });
    const templatePath = path.join(this.ctx.config.document_templates, `${docType}.md`);
    fs.writeFileSync(templatePath, content, 'utf-8');
    this.logger.info('Template created', { path: templatePath });
    return templatePath;
  }

  async listAvailableTemplates(): Promise<string[]> {
    return this.templates.list();
  }
}
