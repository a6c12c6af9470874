/**
 * テスト用のフェイク LLM とコンテキスト
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { AgentConfig, GenerateOptions, TextGenerator } from '@persona-desk/persona-spec';
import { buildStructuredPrompt, createSilentLogger, loadConfig, parseBracketSections } from '@persona-desk/runtime';
import { createModuleContext, type ModuleContext } from './context';

/**
 * 決められた応答を順に返す生成器
 */
export class FakeGenerator implements TextGenerator {
  readonly prompts: string[] = [];
  readonly options: Array<GenerateOptions | undefined> = [];
  private readonly queue: string[];

  constructor(
    responses: string[] = [],
    private readonly fallback = 'フェイク応答'
  ) {
    this.queue = [...responses];
  }

  async generateResponse(prompt: string, options?: GenerateOptions): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    return this.queue.shift() ?? this.fallback;
  }

  async generateStructuredResponse(prompt: string, structure: Record<string, string>): Promise<Record<string, string>> {
    return parseBracketSections(await this.generateResponse(buildStructuredPrompt(prompt, structure)));
  }
}

/** 2024-04-01 10:00:00（ローカル時刻） */
export const FIXED_NOW = new Date(2024, 3, 1, 10, 0, 0);

export interface TestWorkspace {
  dir: string;
  config: AgentConfig;
  ctx: ModuleContext;
  llm: FakeGenerator;
  cleanup(): void;
}

export function createTestWorkspace(
  llm: FakeGenerator = new FakeGenerator(),
  env: Record<string, string> = {}
): TestWorkspace {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'persona-desk-modules-'));
  const config = loadConfig({ cwd: dir, env });
  const ctx = createModuleContext({ config, llm, logger: createSilentLogger(), now: () => FIXED_NOW });

  return {
    dir,
    config,
    ctx,
    llm,
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}
