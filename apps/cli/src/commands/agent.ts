import type { Command } from 'commander';
import type { CliContext } from '../context';
import { parseContextOption, readJsonObject } from '../input';
import { banner, section } from '../ui';

export function registerAgentCommands(program: Command, ctx: CliContext): void {
  program
    .command('interactive')
    .description('ペルソナとの対話セッションを開始')
    .action(async () => {
      const agent = ctx.agent();
      ctx.io.out(banner(`${agent.name} AI エージェント`));

      const session = ctx.session();
      try {
        await agent.interactiveSession(session);
      } finally {
        session.close();
      }
    });

  program
    .command('think')
    .description('質問についてペルソナとして考える')
    .argument('<query>', '質問・考えてほしいこと')
    .option('-c, --context <context>', '追加コンテキスト（JSON または自由記述）')
    .action(async (query: string, options: { context?: string }) => {
      const agent = ctx.agent();
      const answer = await agent.think(query, parseContextOption(options.context));
      ctx.io.out(section(`💭 ${agent.name}の考え`, answer));
    });

  program
    .command('consensus')
    .description('ステークホルダー間の合意形成を支援')
    .argument('<topic>', 'トピック')
    .argument('<positions-file>', '立場ファイル (JSON: 名前 → 立場)')
    .action(async (topic: string, positionsFile: string) => {
      const positions = readJsonObject(positionsFile, ctx.cwd);
      ctx.io.out(`合意形成支援を実施中: ${topic}`);

      const result = await ctx.agent().buildConsensus(topic, positions);
      ctx.io.out(section(`🤝 合意形成プラン（${result.stakeholders.join(', ')}）`, result.consensus_proposal));
    });
}
