import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { LLMChatParams, LLMClient } from '@persona-desk/persona-spec';
import { ValidationError, createSilentLogger, loadConfig } from '@persona-desk/runtime';
import { PersonaAgent } from './persona-agent';
import type { SessionIO } from './types';

const FIXED_NOW = new Date(2024, 3, 1, 10, 0, 0);

function scriptedIO(lines: Array<string | null>) {
  const queue = [...lines];
  const output: string[] = [];
  const io: SessionIO = {
    read: async () => (queue.length > 0 ? (queue.shift() ?? null) : null),
    write: (text) => {
      output.push(text);
    },
  };
  return { io, output };
}

function createChat() {
  return vi.fn(async (params: LLMChatParams) => ({
    content: ` ${params.model}の回答 `,
    tokens_used: { input: 1, output: 1 },
    model: params.model,
  }));
}

describe('PersonaAgent', () => {
  let cwd: string;
  let chat: ReturnType<typeof createChat>;
  let agent: PersonaAgent;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'persona-desk-agent-'));
    chat = createChat();
    const anthropic: LLMClient = { provider: 'anthropic', chat };
    agent = new PersonaAgent({
      config: loadConfig({ cwd, env: { ANTHROPIC_API_KEY: 'test-secret' } }),
      logger: createSilentLogger(),
      clients: { anthropic },
      now: () => FIXED_NOW,
    });
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  const sentPrompt = (call: number) => chat.mock.calls[call]?.[0].messages[0]?.content ?? '';

  it('should think with the persona system prompt', async () => {
    const answer = await agent.think('来期の方針は？', { 部署: '営業' });

    expect(answer).toBe('claude-sonnet-4-20250514の回答');
    expect(chat.mock.calls[0]?.[0].system).toBe(agent.personaPrompt);
    expect(sentPrompt(0)).toBe(
      '【思考要請】\n来期の方針は？\n\n【追加コンテキスト】\n- 部署: 営業\n\n田中誠として、この件について考え、あなたの経験と視点に基づく見解を述べてください。'
    );
  });

  it('should write なし when there is no context', async () => {
    await agent.think('調子はどう？');
    expect(sentPrompt(0)).toContain('【追加コンテキスト】\nなし\n');
  });

  it('should build a consensus proposal', async () => {
    const result = await agent.buildConsensus('在宅勤務', { 営業: '週3出社', 開発: '完全在宅' });

    expect(result).toEqual({
      topic: '在宅勤務',
      stakeholders: ['営業', '開発'],
      consensus_proposal: 'claude-sonnet-4-20250514の回答',
      timestamp: FIXED_NOW.toISOString(),
      facilitator: '田中誠',
    });
    expect(sentPrompt(0)).toContain('【ステークホルダーの立場】\n- 営業: 週3出社\n- 開発: 完全在宅\n');
  });

  it('should accept numeric and list positions', async () => {
    const result = await agent.buildConsensus('予算', { CFO: 300, CTO: '増額', 人事: ['採用', '研修'] });

    expect(result.stakeholders).toEqual(['CFO', 'CTO', '人事']);
    expect(sentPrompt(0)).toContain('【ステークホルダーの立場】\n- CFO: 300\n- CTO: 増額\n- 人事: 採用, 研修\n');
  });

  it('should reject consensus without stakeholders', async () => {
    await expect(agent.buildConsensus('在宅勤務', {})).rejects.toThrow(ValidationError);
    expect(chat).not.toHaveBeenCalled();
  });

  it('should pass the meeting duration through', async () => {
    const plan = await agent.facilitateMeeting('定例', ['進捗'], ['佐藤'], 20);

    expect(plan.duration_minutes).toBe(20);
    expect(plan.schedule[0]?.duration_minutes).toBe(10);
  });

  it('should pass the participant through to the assessment', async () => {
    const result = await agent.assessPersonality('big5', { q1: 'A' }, '鈴木');
    expect(result.participant).toBe('鈴木');
  });

  describe('interactiveSession', () => {
    it('should skip blank lines and stop on an exit command', async () => {
      const { io, output } = scriptedIO(['', '   ', '質問です', 'EXIT', 'ここは読まれない']);

      await agent.interactiveSession(io);

      expect(chat).toHaveBeenCalledTimes(1);
      expect(output).toContain('\n田中誠: claude-sonnet-4-20250514の回答\n');
      expect(output[output.length - 1]).toBe('\n田中誠: ありがとうございました。また何かあればお声がけください。');
    });

    it('should report a failed turn and keep going', async () => {
      chat.mockRejectedValueOnce(new Error('boom'));
      const { io, output } = scriptedIO(['一', '二', '終了']);

      await agent.interactiveSession(io);

      expect(output).toContain(
        '\n申し訳ございません。エラーが発生しました: anthropic (claude-sonnet-4-20250514) request failed: boom\n'
      );
      expect(output).toContain('\n田中誠: claude-sonnet-4-20250514の回答\n');
    });

    it('should end when input closes', async () => {
      const { io, output } = scriptedIO([]);
      await agent.interactiveSession(io);
      expect(output[output.length - 1]).toBe('\n田中誠: 失礼いたします。またいつでもお声がけください。');
    });
  });
});
