/**
 * コマンド入力の読み取り
 */

import * as fs from 'fs';
import * as path from 'path';
import { InvalidArgumentError } from 'commander';
import { InputFileError } from '@persona-desk/runtime';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * カンマ区切りを配列に（空要素は除く）
 */
export function parseCsv(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * --req の JSON を解析。不正なら警告して空の要件
 */
export function parseJsonOption(raw: string | undefined, warn: (message: string) => void): Record<string, unknown> {
  if (raw === undefined) {
    return {};
  }

  try {
    const value: unknown = JSON.parse(raw);
    if (isRecord(value)) {
      return value;
    }
    warn('要件はJSONオブジェクトで指定してください。要件なしで続行します。');
  } catch {
    warn('要件のJSON形式が無効です。要件なしで続行します。');
  }
  return {};
}

/**
 * JSON ファイルを読む（失敗は InputFileError）
 */
export function readJsonFile(filePath: string, cwd: string): unknown {
  const resolved = path.resolve(cwd, filePath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw new InputFileError(filePath, error instanceof Error ? error.message : String(error));
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new InputFileError(filePath, `invalid JSON (${error instanceof Error ? error.message : String(error)})`);
  }
}

/**
 * 必須の JSON オブジェクトファイル
 */
export function readJsonObject(filePath: string, cwd: string): Record<string, unknown> {
  const value = readJsonFile(filePath, cwd);
  if (!isRecord(value)) {
    throw new InputFileError(filePath, 'expected a JSON object');
  }
  return value;
}

/**
 * 任意の JSON オブジェクトファイル。読めなければ警告して空
 */
export function readOptionalJsonObject(
  filePath: string | undefined,
  cwd: string,
  warn: (message: string) => void
): Record<string, unknown> {
  if (!filePath) {
    return {};
  }

  try {
    return readJsonObject(filePath, cwd);
  } catch (error) {
    if (!(error instanceof InputFileError)) {
      throw error;
    }
    warn(`${error.message}。空の内容で続行します。`);
    return {};
  }
}

/**
 * think の --context。JSON オブジェクトでなければ自由記述として扱う
 */
export function parseContextOption(raw: string | undefined): Record<string, unknown> | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  const freeText = { 補足: raw };
  try {
    const value: unknown = JSON.parse(raw);
    return isRecord(value) ? value : freeText;
  } catch {
    return freeText;
  }
}

/**
 * 正の整数（分）
 */
export function parseMinutes(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError('正の整数（分）で指定してください。');
  }
  return value;
}
