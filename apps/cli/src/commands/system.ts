import * as fs from 'fs';
import * as path from 'path';
import type { Command } from 'commander';
import { DEFAULT_PERSONALITY, isKnownModel, resolveProvider } from '@persona-desk/persona-spec';
import { PERSONALITY_FILE_NAME, ensureDirectories, savePersonality } from '@persona-desk/runtime';
import type { CliContext } from '../context';
import { section } from '../ui';

export function registerSystemCommands(program: Command, ctx: CliContext): void {
  program
    .command('config-show')
    .description('現在の設定を表示（APIキーは表示しない）')
    .action(() => {
      const config = ctx.config();
      const { ai_model: model, personality } = config;
      const keyStatus = (value: string | undefined) => (value ? '設定済み' : '未設定');
      const provider = resolveProvider(model.default_model);
      const providerKey = provider === 'openai' ? model.openai_api_key : model.anthropic_api_key;

      const rows: Array<[string, string]> = [
        ['エージェント名', personality.name],
        ['言語', personality.language],
        ['コミュニケーションスタイル', personality.communication_style],
        ['専門分野', personality.expertise_areas.join(', ')],
        ['既定モデル', model.default_model],
        ['プロバイダー', provider === 'mock' || !providerKey ? `${provider}（モック応答）` : provider],
        ['Temperature', String(model.temperature)],
        ['最大トークン', String(model.max_tokens)],
        ['OpenAI APIキー', keyStatus(model.openai_api_key)],
        ['Anthropic APIキー', keyStatus(model.anthropic_api_key)],
        ['評価フレームワーク', config.personality_models.join(', ')],
        ['会議時間（既定）', `${config.default_meeting_duration}分`],
        ['テンプレート', config.template_dir],
        ['出力先', config.output_dir],
        ['ログ', `${config.log_dir} (${config.log_level})`],
      ];

      ctx.io.out(section('現在の設定', rows.map(([label, value]) => `  ${label}: ${value}`).join('\n')));
      if (!isKnownModel(model.default_model)) {
        ctx.warn(`モデル ${model.default_model} は動作確認済みの一覧にありません。`);
      }
    });

  program
    .command('setup')
    .description('設定ファイルとディレクトリを作成')
    .option('--force', '既存の personality.yaml を上書き')
    .action((options: { force?: boolean }) => {
      const config = ctx.config();
      const personalityPath = path.join(config.config_dir, PERSONALITY_FILE_NAME);

      if (fs.existsSync(personalityPath) && !options.force) {
        ctx.io.out(`既存の設定を維持します: ${personalityPath}（上書きは --force）`);
      } else {
        savePersonality(DEFAULT_PERSONALITY, personalityPath);
        ctx.io.out(`✓ ペルソナ設定を作成しました: ${personalityPath}`);
      }

      ensureDirectories(config);
      ctx.io.out('✓ セットアップが完了しました');
      ctx.io.out('\n次のステップ:');
      ctx.io.out('1. .env に ANTHROPIC_API_KEY または OPENAI_API_KEY を設定');
      ctx.io.out('2. persona-desk interactive で対話を開始');
    });
}
