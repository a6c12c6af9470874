import type { Command } from 'commander';
import { InputFileError } from '@persona-desk/runtime';
import type { CliContext } from '../context';
import { parseCsv, readJsonFile, readOptionalJsonObject } from '../input';
import { section } from '../ui';

export function registerConsultationCommands(program: Command, ctx: CliContext): void {
  program
    .command('consult')
    .description('相談に回答')
    .argument('<type>', '相談の種類 (strategy, management, career, team など)')
    .argument('<description>', '相談内容')
    .option('-d, --details <file>', '詳細ファイル (JSON)')
    .action(async (consultationType: string, description: string, options: { details?: string }) => {
      const details = { 相談内容: description, ...readOptionalJsonObject(options.details, ctx.cwd, ctx.warn) };
      ctx.io.out(`相談に対応中: ${consultationType}`);

      const answer = await ctx.agent().provideConsultation(consultationType, details);
      ctx.io.out(section('💼 回答・アドバイス', answer));
    });

  program
    .command('proposal')
    .description('提案書を作成')
    .argument('<topic>', '提案テーマ')
    .option('-r, --requirements <file>', '要件ファイル (JSON)')
    .action(async (topic: string, options: { requirements?: string }) => {
      const requirements = readOptionalJsonObject(options.requirements, ctx.cwd, ctx.warn);
      ctx.io.out(`提案書を作成中: ${topic}`);

      const content = await ctx.agent().makeProposal(topic, requirements);
      ctx.io.out(section(`📊 ${topic}`, content));
    });

  program
    .command('analyze')
    .description('ビジネスケースを分析')
    .argument('<description>', 'ビジネスケースの説明')
    .option('-f, --focus <areas>', '分析観点（カンマ区切り）')
    .action(async (description: string, options: { focus?: string }) => {
      const focus = parseCsv(options.focus);
      const result = await ctx.agent().analyzeBusinessCase(description, focus.length > 0 ? focus : undefined);

      ctx.io.out(section(`🔍 ビジネスケース分析（${result.analysis_focus.join(', ')}）`, result.full_analysis));
      const structured = Object.entries(result.structured_analysis).map(([key, value]) => `【${key}】\n${value}`);
      if (structured.length > 0) {
        ctx.io.out(section('構造化された分析', structured.join('\n\n')));
      }
      ctx.io.out(`保存先: ${result.record_path}`);
    });

  program
    .command('decide')
    .description('意思決定を支援')
    .argument('<context>', '意思決定の背景')
    .argument('<options-file>', '選択肢ファイル (JSON 配列)')
    .action(async (decisionContext: string, optionsFile: string) => {
      const options = readJsonFile(optionsFile, ctx.cwd);
      if (!Array.isArray(options)) {
        throw new InputFileError(optionsFile, 'expected a JSON array of options');
      }

      const result = await ctx.agent().provideDecisionSupport(decisionContext, options);
      ctx.io.out(section('⚖️ 意思決定支援', result.analysis));
      ctx.io.out(section('推奨サマリー', result.recommendation_summary));
      ctx.io.out(`保存先: ${result.record_path}`);
    });
}
