/**
 * 画面出力の整形
 */

const WIDTH = 60;
const RULE = '─'.repeat(WIDTH);

/**
 * ╔═╗ 枠のバナー
 */
export function banner(title: string): string {
  const inner = WIDTH - 2;
  const padding = Math.max(0, inner - displayWidth(title));
  const left = Math.floor(padding / 2);
  return [
    `╔${'═'.repeat(inner)}╗`,
    `║${' '.repeat(left)}${title}${' '.repeat(padding - left)}║`,
    `╚${'═'.repeat(inner)}╝`,
  ].join('\n');
}

/**
 * ─── 区切りの見出し付きセクション
 */
export function section(title: string, body: string): string {
  return `${RULE}\n${title}\n${RULE}\n\n${body}\n`;
}

export function bullets(items: readonly string[]): string {
  return items.map((item) => `  • ${item}`).join('\n');
}

/**
 * 全角文字を幅2として数える
 */
export function displayWidth(text: string): number {
  let width = 0;
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    width += code > 0xff ? 2 : 1;
  }
  return width;
}
