/**
 * persona-desk CLI 定義
 */

import { Command, CommanderError } from 'commander';
import type { CliContext } from './context';
import { registerAgentCommands } from './commands/agent';
import { registerAssessmentCommands } from './commands/assessments';
import { registerConsultationCommands } from './commands/consultation';
import { registerDocumentCommands } from './commands/documents';
import { registerMeetingCommands } from './commands/meetings';
import { registerSystemCommands } from './commands/system';

export const CLI_NAME = 'persona-desk';
export const CLI_VERSION = '0.1.0';

export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('ペルソナ AI エージェント - 文書作成・会議進行・評価・相談')
    .version(CLI_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.io.out(text.trimEnd()),
      writeErr: (text) => ctx.io.err(text.trimEnd()),
    });

  registerAgentCommands(program, ctx);
  registerDocumentCommands(program, ctx);
  registerMeetingCommands(program, ctx);
  registerAssessmentCommands(program, ctx);
  registerConsultationCommands(program, ctx);
  registerSystemCommands(program, ctx);

  return program;
}

/**
 * コマンドを実行して終了コードを返す
 */
export async function run(argv: readonly string[], ctx: CliContext): Promise<number> {
  const program = createProgram(ctx);

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    // 使い方の誤りやヘルプ表示は commander が出力済み
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const message = error instanceof Error ? error.message : String(error);
    ctx.io.err(`エラーが発生しました: ${message}`);
    return 1;
  }
}
