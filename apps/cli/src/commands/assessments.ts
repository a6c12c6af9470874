import type { Command } from 'commander';
import { UnsupportedTypeError } from '@persona-desk/runtime';
import type { CliContext } from '../context';
import { readJsonObject } from '../input';
import { bullets, section } from '../ui';

/**
 * 回答ファイルがない場合に尋ねる項目
 */
const INTERVIEW_QUESTIONS: ReadonlyArray<[key: string, question: string]> = [
  ['behavioral_observations', '行動・性格の観察結果: '],
  ['work_style', '仕事のスタイル: '],
  ['communication_style', 'コミュニケーションスタイル: '],
];

export function registerAssessmentCommands(program: Command, ctx: CliContext): void {
  program
    .command('assessment')
    .description('性格評価を実施')
    .argument('<type>', '評価の種類 (mbti, big5, disc, strengths)')
    .option('-p, --participant <name>', '評価対象者名')
    .option('-r, --responses <file>', '回答データファイル (JSON)')
    .action(async (assessmentType: string, options: { participant?: string; responses?: string }) => {
      const supported = ctx.agent().supportedAssessmentTypes();
      if (!supported.includes(assessmentType)) {
        throw new UnsupportedTypeError('assessment type', assessmentType, supported);
      }

      const responses = options.responses
        ? readJsonObject(options.responses, ctx.cwd)
        : await interview(ctx, assessmentType);

      ctx.io.out(`性格評価を実施中: ${assessmentType}`);
      const result = await ctx.agent().assessPersonality(assessmentType, responses, options.participant);

      ctx.io.out(section(`🎯 ${result.framework} 評価（${result.participant}）`, result.analysis));
      if (result.insights.length > 0) {
        ctx.io.out(section('主要な洞察', bullets(result.insights)));
      }
      ctx.io.out(`保存先: ${result.record_path}`);
    });

  program
    .command('questionnaire')
    .description('評価用の質問票を作成')
    .argument('<type>', '評価の種類 (mbti, big5, disc, strengths)')
    .action(async (assessmentType: string) => {
      const items = await ctx.agent().createAssessmentQuestionnaire(assessmentType);
      const body = items
        .map((item, i) => [`質問${i + 1}: ${item.question}`, ...item.options.map((o, j) => `  ${'ABCD'.charAt(j)}) ${o}`)].join('\n'))
        .join('\n\n');
      ctx.io.out(section(`📋 ${assessmentType} 質問票（${items.length}問）`, body || '質問を読み取れませんでした。'));
    });
}

async function interview(ctx: CliContext, assessmentType: string): Promise<Record<string, unknown>> {
  ctx.io.out(`${assessmentType} 評価のための情報を入力してください`);
  const session = ctx.session();
  const responses: Record<string, unknown> = {};
  try {
    for (const [key, question] of INTERVIEW_QUESTIONS) {
      const answer = (await session.read(question))?.trim();
      if (answer) {
        responses[key] = answer;
      }
    }
  } finally {
    session.close();
  }
  return responses;
}
