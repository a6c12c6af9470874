/**
 * 日付フォーマット（ローカル時刻）
 */

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/**
 * YYYY年MM月DD日
 */
export function formatJapaneseDate(date: Date): string {
  return `${date.getFullYear()}年${pad(date.getMonth() + 1)}月${pad(date.getDate())}日`;
}

/**
 * YYYY年MM月DD日 HH:MM
 */
export function formatJapaneseDateTime(date: Date): string {
  return `${formatJapaneseDate(date)} ${formatClock(date)}`;
}

/**
 * HH:MM
 */
export function formatClock(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * ファイル名用タイムスタンプ YYYYMMDD_HHMMSS
 */
export function fileStamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * 分単位で加算
 */
export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60_000);
}
