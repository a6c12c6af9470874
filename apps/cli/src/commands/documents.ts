import type { Command } from 'commander';
import type { CliContext } from '../context';
import { parseJsonOption } from '../input';
import { bullets, section } from '../ui';

export function registerDocumentCommands(program: Command, ctx: CliContext): void {
  program
    .command('document')
    .description('文書を作成')
    .argument('<type>', '文書の種類 (proposal, report, memo など)')
    .argument('<topic>', 'テーマ')
    .option('-r, --req <json>', '要件 (JSON)')
    .action(async (docType: string, topic: string, options: { req?: string }) => {
      const requirements = parseJsonOption(options.req, ctx.warn);
      ctx.io.out(`文書を作成中: ${docType} - ${topic}`);

      const content = await ctx.agent().createDocument(docType, topic, requirements);
      ctx.io.out(section(`📄 ${topic}`, content));
    });

  program
    .command('templates')
    .description('利用可能な文書テンプレートを表示')
    .action(async () => {
      const names = await ctx.agent().listTemplates();
      ctx.io.out(section('文書テンプレート', names.length > 0 ? bullets(names) : '  テンプレートはありません'));
    });
}
