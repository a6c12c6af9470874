import { describe, it, expect } from 'vitest';
import {
  AIModelConfigSchema,
  DEFAULT_PERSONALITY,
  PersonalityConfigSchema,
  validatePersonality,
} from './schemas';
import { resolveProvider, isKnownModel, isReasoningModel } from './llm-policy';

describe('PersonalityConfigSchema', () => {
  it('should fill every field with defaults from an empty record', () => {
    expect(DEFAULT_PERSONALITY.name).toBe('田中誠');
    expect(DEFAULT_PERSONALITY.language).toBe('ja');
    expect(DEFAULT_PERSONALITY.expertise_areas).toEqual(['management', 'strategy', 'team_leadership']);
    expect(DEFAULT_PERSONALITY.personality_traits.conscientiousness).toBe(0.9);
  });

  it('should keep provided values and default the rest', () => {
    const parsed = PersonalityConfigSchema.parse({ name: '佐藤花子', meeting_style: 'directive' });
    expect(parsed.name).toBe('佐藤花子');
    expect(parsed.meeting_style).toBe('directive');
    expect(parsed.communication_style).toBe('polite_formal');
  });

  it('should reject trait scores outside 0..1', () => {
    const result = validatePersonality({ personality_traits: { openness: 1.5 } });
    expect(result.success).toBe(false);
  });

  it('should treat null as an empty record', () => {
    const result = validatePersonality(null);
    expect(result.success).toBe(true);
  });
});

describe('AIModelConfigSchema', () => {
  it('should coerce numeric strings from the environment', () => {
    const parsed = AIModelConfigSchema.parse({ temperature: '0', max_tokens: '512' });
    expect(parsed.temperature).toBe(0);
    expect(parsed.max_tokens).toBe(512);
  });

  it('should reject a non-numeric temperature', () => {
    expect(AIModelConfigSchema.safeParse({ temperature: 'hot' }).success).toBe(false);
  });
});

describe('resolveProvider', () => {
  it('should route gpt and o-series models to openai', () => {
    expect(resolveProvider('gpt-4o')).toBe('openai');
    expect(resolveProvider('o1-mini')).toBe('openai');
  });

  it('should tell reasoning models apart from chat models', () => {
    expect(isReasoningModel('o3-mini')).toBe(true);
    expect(isReasoningModel('O1')).toBe(true);
    expect(isReasoningModel('gpt-4o')).toBe(false);
  });

  it('should route claude models to anthropic', () => {
    expect(resolveProvider('claude-sonnet-4-20250514')).toBe('anthropic');
    expect(resolveProvider(' Claude-3-5-haiku-20241022')).toBe('anthropic');
  });

  it('should fall back to mock for anything else', () => {
    expect(resolveProvider('local-llama')).toBe('mock');
  });
});

describe('isKnownModel', () => {
  it('should recognise listed model ids only', () => {
    expect(isKnownModel('gpt-4')).toBe(true);
    expect(isKnownModel('gpt-5-preview')).toBe(false);
  });
});
