import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { LLMChatParams, LLMClient } from '@persona-desk/persona-spec';
import { createSilentLogger } from '@persona-desk/runtime';
import { PersonaAgent } from '@persona-desk/agents';
import { createCliContext, type CliSession } from './context';
import { run } from './program';
import { section } from './ui';

const FIXED_NOW = new Date(2024, 3, 1, 10, 0, 0);
const ANSWER = 'claude-sonnet-4-20250514の回答';

function scriptedSession(lines: Array<string | null>) {
  const queue = [...lines];
  const prompts: string[] = [];
  const written: string[] = [];
  const session: CliSession = {
    read: async (prompt) => {
      prompts.push(prompt);
      return queue.length > 0 ? (queue.shift() ?? null) : null;
    },
    write: (text) => {
      written.push(text);
    },
    close: vi.fn(),
  };
  return { session, prompts, written };
}

function createChat() {
  return vi.fn(async (params: LLMChatParams) => ({
    content: `${params.model}の回答`,
    tokens_used: { input: 1, output: 1 },
    model: params.model,
  }));
}

describe('persona-desk CLI', () => {
  let cwd: string;
  let out: string[];
  let err: string[];
  let chat: ReturnType<typeof createChat>;
  let sessionLines: Array<string | null>;
  let scripted: ReturnType<typeof scriptedSession>;
  let env: Record<string, string>;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'persona-desk-cli-'));
    out = [];
    err = [];
    sessionLines = [];
    scripted = scriptedSession([]);
    env = { ANTHROPIC_API_KEY: 'test-secret' };
    chat = createChat();
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  const exec = (...argv: string[]) => {
    const anthropic: LLMClient = { provider: 'anthropic', chat };
    const ctx = createCliContext({
      io: { out: (text) => out.push(text), err: (text) => err.push(text) },
      cwd,
      env,
      createAgent: (config) =>
        new PersonaAgent({ config, logger: createSilentLogger(), clients: { anthropic }, now: () => FIXED_NOW }),
      createSession: () => {
        scripted = scriptedSession(sessionLines);
        return scripted.session;
      },
    });
    return run(argv, ctx);
  };

  const sentPrompt = (call: number) => chat.mock.calls[call]?.[0].messages[0]?.content ?? '';

  const writeJson = (name: string, value: unknown) => {
    fs.writeFileSync(path.join(cwd, name), JSON.stringify(value), 'utf-8');
  };

  // ===========================================================================
  // Agent
  // ===========================================================================

  it('should print the persona answer for think', async () => {
    const code = await exec('think', '来期の方針は？', '-c', '{"部署":"営業"}');

    expect(code).toBe(0);
    expect(out).toEqual([section('💭 田中誠の考え', ANSWER)]);
    expect(sentPrompt(0)).toContain('【追加コンテキスト】\n- 部署: 営業\n');
  });

  it('should run an interactive session until exit', async () => {
    sessionLines = ['こんにちは', 'exit'];
    const code = await exec('interactive');

    expect(code).toBe(0);
    expect(out[0]).toContain('田中誠 AI エージェント');
    expect(scripted.written).toContain(`\n田中誠: ${ANSWER}\n`);
    expect(scripted.session.close).toHaveBeenCalledTimes(1);
  });

  it('should build consensus from a positions file', async () => {
    writeJson('positions.json', { 営業: '週3出社', 開発: '完全在宅' });
    const code = await exec('consensus', '在宅勤務', 'positions.json');

    expect(code).toBe(0);
    expect(out).toEqual(['合意形成支援を実施中: 在宅勤務', section('🤝 合意形成プラン（営業, 開発）', ANSWER)]);
  });

  it('should fail with exit code 1 when the positions file is missing', async () => {
    const code = await exec('consensus', '在宅勤務', 'missing.json');

    expect(code).toBe(1);
    expect(err).toHaveLength(1);
    expect(err[0]).toMatch(/^エラーが発生しました: Failed to read missing\.json: /);
    expect(chat).not.toHaveBeenCalled();
  });

  // ===========================================================================
  // Documents
  // ===========================================================================

  it('should warn about invalid requirements and still generate the document', async () => {
    const code = await exec('document', 'report', '月次報告', '-r', '{bad');

    expect(code).toBe(0);
    expect(err).toEqual(['⚠️ 要件のJSON形式が無効です。要件なしで続行します。']);
    expect(out).toEqual(['文書を作成中: report - 月次報告', section('📄 月次報告', ANSWER)]);
    expect(fs.readdirSync(path.join(cwd, 'output', 'documents'))).toEqual(['report_月次報告_20240401_100000.md']);
  });

  it('should list document templates', async () => {
    fs.mkdirSync(path.join(cwd, 'templates', 'documents'), { recursive: true });
    fs.writeFileSync(path.join(cwd, 'templates', 'documents', 'report.md'), '# {{ topic }}');
    fs.writeFileSync(path.join(cwd, 'templates', 'documents', 'memo.md'), '# {{ topic }}');

    const code = await exec('templates');

    expect(code).toBe(0);
    expect(out).toEqual([section('文書テンプレート', '  • memo\n  • report')]);
  });

  // ===========================================================================
  // Meetings
  // ===========================================================================

  it('should print the meeting schedule', async () => {
    const code = await exec('meeting', '定例', '進捗,課題', '佐藤,鈴木', '-d', '30');

    expect(code).toBe(0);
    expect(out[1]).toBe(
      section('🗓️ タイムスケジュール（30分）', '  • 10:05-10:15  進捗（10分）\n  • 10:15-10:25  課題（10分）')
    );
    expect(out[2]).toBe(section('🎯 定例 進行プラン', ANSWER));
  });

  it('should reject a meeting too short for opening and closing', async () => {
    const code = await exec('meeting', '定例', '進捗', '佐藤', '-d', '5');

    expect(code).toBe(1);
    expect(err).toEqual(['エラーが発生しました: Validation failed: duration: must be an integer greater than 10 minutes']);
    expect(chat).not.toHaveBeenCalled();
  });

  it('should report a non-numeric duration as a usage error', async () => {
    const code = await exec('meeting', '定例', '進捗', '佐藤', '-d', 'abc');

    expect(code).toBe(1);
    expect(err.join('\n')).toContain('正の整数（分）で指定してください。');
    expect(chat).not.toHaveBeenCalled();
  });

  it('should generate minutes from a meeting file', async () => {
    writeJson('meeting.json', {
      meeting_info: { meeting_type: '週次定例', participants: ['佐藤', '鈴木'] },
      decisions: ['リリースを延期する'],
      action_items: [{ task: '日程の再調整', assignee: '佐藤' }],
    });

    const code = await exec('minutes', 'meeting.json');

    expect(code).toBe(0);
    expect(out[0]).toContain('# 週次定例 議事録');
    expect(out[0]).toContain('- 日程の再調整（担当: 佐藤、期限: 未定）');
    expect(sentPrompt(0)).toContain('- 参加者: 佐藤, 鈴木');
  });

  it('should reject minutes whose action items have no task', async () => {
    writeJson('meeting.json', { action_items: [{ assignee: '佐藤' }] });

    const code = await exec('minutes', 'meeting.json');

    expect(code).toBe(1);
    expect(err[0]).toMatch(/^エラーが発生しました: Failed to read meeting\.json: action_items\.0\.task/);
  });

  // ===========================================================================
  // Assessments
  // ===========================================================================

  it('should interview for responses when no file is given', async () => {
    sessionLines = ['几帳面', '', '穏やか'];
    const code = await exec('assessment', 'big5', '-p', '佐藤');

    expect(code).toBe(0);
    expect(scripted.prompts).toEqual(['行動・性格の観察結果: ', '仕事のスタイル: ', 'コミュニケーションスタイル: ']);
    expect(sentPrompt(0)).toContain('behavioral_observations: 几帳面\ncommunication_style: 穏やか');
    expect(out).toContain(section('🎯 Big Five 評価（佐藤）', ANSWER));
  });

  it('should check the assessment type before interviewing', async () => {
    sessionLines = ['几帳面'];
    const code = await exec('assessment', 'enneagram');

    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(scripted.prompts).toEqual([]);
    expect(err).toEqual([
      'エラーが発生しました: Unsupported assessment type: enneagram (supported: mbti, big5, disc, strengths)',
    ]);
    expect(chat).not.toHaveBeenCalled();
  });

  it('should reject an unsupported assessment type', async () => {
    writeJson('responses.json', { note: 'x' });
    const code = await exec('assessment', 'enneagram', '-r', 'responses.json');

    expect(code).toBe(1);
    expect(err).toEqual([
      'エラーが発生しました: Unsupported assessment type: enneagram (supported: mbti, big5, disc, strengths)',
    ]);
  });

  // ===========================================================================
  // Consultation
  // ===========================================================================

  it('should merge the details file into the consultation', async () => {
    writeJson('details.json', { 予算: '500万円' });
    const code = await exec('consult', 'strategy', '新規事業の進め方', '-d', 'details.json');

    expect(code).toBe(0);
    expect(sentPrompt(0)).toContain('相談内容: 新規事業の進め方\n予算: 500万円');
    expect(out).toEqual(['相談に対応中: strategy', section('💼 回答・アドバイス', ANSWER)]);
  });

  it('should require a JSON array of decision options', async () => {
    writeJson('options.json', { name: 'A' });
    const code = await exec('decide', '拠点の移転', 'options.json');

    expect(code).toBe(1);
    expect(err).toEqual(['エラーが発生しました: Failed to read options.json: expected a JSON array of options']);
  });

  // ===========================================================================
  // System
  // ===========================================================================

  it('should show the configuration without secrets', async () => {
    const code = await exec('config-show');

    expect(code).toBe(0);
    expect(out[0]).toContain('  Anthropic APIキー: 設定済み');
    expect(out[0]).toContain('  OpenAI APIキー: 未設定');
    expect(out[0]).toContain('  プロバイダー: anthropic');
    expect(out[0]).not.toContain('test-secret');
    expect(err).toEqual([]);
  });

  it('should warn about unknown models', async () => {
    env = { DEFAULT_MODEL: 'claude-next' };
    const code = await exec('config-show');

    expect(code).toBe(0);
    expect(out[0]).toContain('  プロバイダー: anthropic（モック応答）');
    expect(err).toEqual(['⚠️ モデル claude-next は動作確認済みの一覧にありません。']);
  });

  it('should keep an existing personality file unless forced', async () => {
    const personalityPath = path.join(cwd, 'config', 'personality.yaml');

    expect(await exec('setup')).toBe(0);
    expect(fs.readFileSync(personalityPath, 'utf-8')).toContain('name: 田中誠');

    fs.writeFileSync(personalityPath, 'name: 山本\n');
    expect(await exec('setup')).toBe(0);
    expect(fs.readFileSync(personalityPath, 'utf-8')).toBe('name: 山本\n');

    expect(await exec('setup', '--force')).toBe(0);
    expect(fs.readFileSync(personalityPath, 'utf-8')).toContain('name: 田中誠');
    expect(fs.existsSync(path.join(cwd, 'output'))).toBe(true);
  });
});
