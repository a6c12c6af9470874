import { describe, it, expect } from 'vitest';
import { DEFAULT_PERSONALITY, PersonalityConfigSchema } from '@persona-desk/persona-spec';
import { buildPersonaPrompt, formatContext } from './persona-prompt';

describe('buildPersonaPrompt', () => {
  it('should describe the default persona', () => {
    const prompt = buildPersonaPrompt(DEFAULT_PERSONALITY);

    expect(prompt.startsWith('あなたは田中誠として振る舞います。')).toBe(true);
    expect(prompt).toContain('- 専門分野: management, strategy, team_leadership\n');
    expect(prompt).toContain('【性格特性】\n- 開放性: 0.8/1.0\n- 誠実性: 0.9/1.0\n');
    expect(prompt).toContain('- 神経症傾向: 0.2/1.0\n');
  });

  it('should render missing traits as 0.5 and whole scores with one decimal', () => {
    const personality = PersonalityConfigSchema.parse({ personality_traits: { openness: 1, neuroticism: 0 } });
    const prompt = buildPersonaPrompt(personality);

    expect(prompt).toContain('- 開放性: 1.0/1.0\n');
    expect(prompt).toContain('- 誠実性: 0.5/1.0\n');
    expect(prompt).toContain('- 神経症傾向: 0.0/1.0\n');
  });
});

describe('formatContext', () => {
  it('should return なし without context', () => {
    expect(formatContext()).toBe('なし');
    expect(formatContext({})).toBe('なし');
  });

  it('should render one dash line per entry', () => {
    expect(formatContext({ 部署: '営業', 期限: ['4月', '5月'], 予算: { 上限: 100 } })).toBe(
      '- 部署: 営業\n- 期限: 4月, 5月\n- 予算: {"上限":100}'
    );
  });
});
