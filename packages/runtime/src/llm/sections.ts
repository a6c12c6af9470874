/**
 * 【見出し】形式の応答を区切る
 *
 * 行全体が【name】のものを見出しとし、次の見出しまでの本文（trim済み）を割り当てる。
 * 最初の見出しより前の本文は捨てる
 */
export function parseBracketSections(text: string): Record<string, string> {
  const result: Record<string, string> = {};
  let current: string | null = null;
  let buffer: string[] = [];

  const flush = () => {
    if (current !== null) {
      result[current] = buffer.join('\n').trim();
    }
  };

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (line.length > 2 && line.startsWith('【') && line.endsWith('】')) {
      flush();
      current = line.slice(1, -1);
      buffer = [];
    } else {
      buffer.push(line);
    }
  }
  flush();

  return result;
}

/**
 * 構造指定を付けたプロンプト
 */
export function buildStructuredPrompt(prompt: string, structure: Record<string, string>): string {
  const lines = Object.entries(structure).map(([key, description]) => `【${key}】${description}`);
  return `${prompt}\n\n以下の構造で回答してください：\n${lines.join('\n')}\n`;
}
