import { describe, it, expect } from 'vitest';
import { buildStructuredPrompt, parseBracketSections } from './sections';

describe('parseBracketSections', () => {
  it('should split text by bracket headers', () => {
    const text = '前置き\n【概要】\n  一行目\n二行目\n\n【結論】\n採用する\n';
    expect(parseBracketSections(text)).toEqual({
      概要: '一行目\n二行目',
      結論: '採用する',
    });
  });

  it('should ignore headers that share a line with text', () => {
    expect(parseBracketSections('【概要】本文\n【結論】\nはい')).toEqual({ 結論: 'はい' });
  });

  it('should return an empty record without headers', () => {
    expect(parseBracketSections('見出しなし')).toEqual({});
  });
});

describe('buildStructuredPrompt', () => {
  it('should append one header line per key', () => {
    expect(buildStructuredPrompt('分析して', { 市場: '市場規模', リスク: '主要リスク' })).toBe(
      '分析して\n\n以下の構造で回答してください：\n【市場】市場規模\n【リスク】主要リスク\n'
    );
  });
});
