/**
 * 設定ローダー
 *
 * - 環境変数（CLIでは dotenv 経由）から AI モデル・ディレクトリ設定
 * - <configDir>/personality.yaml からペルソナ設定（任意）
 * - 相対パスは cwd 基準で解決
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import {
  AgentConfigSchema,
  PersonalityConfigSchema,
  validatePersonality,
  type AgentConfig,
  type PersonalityConfig,
} from '@persona-desk/persona-spec';
import { ConfigError, formatIssues } from './errors';

export const PERSONALITY_FILE_NAME = 'personality.yaml';

export interface LoadConfigOptions {
  cwd: string;
  env: Record<string, string | undefined>;
}

/**
 * 空文字は未設定扱い
 */
function envValue(env: LoadConfigOptions['env'], key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function splitCsv(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * personality.yaml を読み込む（存在しない場合は空オブジェクト）
 */
export function readPersonalityFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  const raw = fs.readFileSync(filePath, 'utf-8');
  try {
    return parseYaml(raw) ?? {};
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${filePath}`, [error instanceof Error ? error.message : String(error)]);
  }
}

/**
 * 設定読み込み
 */
export function loadConfig(options: LoadConfigOptions): AgentConfig {
  const { cwd, env } = options;
  const resolveDir = (value: string | undefined, fallback: string) => path.resolve(cwd, value ?? fallback);

  const templateDir = resolveDir(envValue(env, 'TEMPLATE_DIR'), 'templates');
  const configDir = resolveDir(envValue(env, 'CONFIG_DIR'), 'config');
  const personalityModels = envValue(env, 'PERSONALITY_MODELS');

  const personalityPath = path.join(configDir, PERSONALITY_FILE_NAME);
  const personality = validatePersonality(readPersonalityFile(personalityPath));
  if (!personality.success) {
    throw new ConfigError(`Invalid personality in ${personalityPath}`, formatIssues(personality.error.issues));
  }

  const candidate = {
    personality: personality.data,
    ai_model: {
      openai_api_key: envValue(env, 'OPENAI_API_KEY'),
      anthropic_api_key: envValue(env, 'ANTHROPIC_API_KEY'),
      default_model: envValue(env, 'DEFAULT_MODEL'),
      temperature: envValue(env, 'TEMPERATURE'),
      max_tokens: envValue(env, 'MAX_TOKENS'),
    },
    template_dir: templateDir,
    output_dir: resolveDir(envValue(env, 'OUTPUT_DIR'), 'output'),
    config_dir: configDir,
    log_dir: resolveDir(envValue(env, 'LOG_DIR'), 'logs'),
    log_level: envValue(env, 'LOG_LEVEL'),
    document_templates: path.join(templateDir, 'documents'),
    meeting_templates: path.join(templateDir, 'meetings'),
    assessment_templates: path.join(templateDir, 'assessments'),
    default_meeting_duration: envValue(env, 'DEFAULT_MEETING_DURATION'),
    personality_models: personalityModels ? splitCsv(personalityModels) : undefined,
  };

  const result = AgentConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatIssues(result.error.issues));
  }

  return result.data;
}

/**
 * ペルソナ設定を YAML で保存
 */
export function savePersonality(personality: PersonalityConfig, filePath: string): void {
  const validated = PersonalityConfigSchema.parse(personality);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, stringifyYaml(validated), 'utf-8');
}

/**
 * 必要なディレクトリを作成
 */
export function ensureDirectories(config: AgentConfig): string[] {
  const directories = [
    config.template_dir,
    config.output_dir,
    config.config_dir,
    config.log_dir,
    config.document_templates,
    config.meeting_templates,
    config.assessment_templates,
  ];

  for (const directory of directories) {
    fs.mkdirSync(directory, { recursive: true });
  }

  return directories;
}
