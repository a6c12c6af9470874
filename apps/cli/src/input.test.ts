import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { InputFileError } from '@persona-desk/runtime';
import {
  parseContextOption,
  parseCsv,
  parseJsonOption,
  parseMinutes,
  readJsonFile,
  readJsonObject,
  readOptionalJsonObject,
} from './input';

describe('parseCsv', () => {
  it('should trim items and drop empty ones', () => {
    expect(parseCsv(' 進捗 , 課題,, 次回 ')).toEqual(['進捗', '課題', '次回']);
  });

  it('should return an empty list for undefined', () => {
    expect(parseCsv(undefined)).toEqual([]);
  });
});

describe('parseJsonOption', () => {
  it('should parse a JSON object', () => {
    const warnings: string[] = [];
    expect(parseJsonOption('{"audience":"役員"}', (m) => warnings.push(m))).toEqual({ audience: '役員' });
    expect(warnings).toEqual([]);
  });

  it('should warn and fall back to an empty object on invalid JSON', () => {
    const warnings: string[] = [];
    expect(parseJsonOption('{bad', (m) => warnings.push(m))).toEqual({});
    expect(warnings).toEqual(['要件のJSON形式が無効です。要件なしで続行します。']);
  });

  it('should reject JSON that is not an object', () => {
    const warnings: string[] = [];
    expect(parseJsonOption('[1,2]', (m) => warnings.push(m))).toEqual({});
    expect(warnings).toEqual(['要件はJSONオブジェクトで指定してください。要件なしで続行します。']);
  });
});

describe('parseContextOption', () => {
  it('should keep a JSON object as is', () => {
    expect(parseContextOption('{"部署":"営業"}')).toEqual({ 部署: '営業' });
  });

  it('should treat other text as free-form context', () => {
    expect(parseContextOption('来週の役員会向け')).toEqual({ 補足: '来週の役員会向け' });
    expect(parseContextOption('42')).toEqual({ 補足: '42' });
  });

  it('should return undefined for blank input', () => {
    expect(parseContextOption('  ')).toBeUndefined();
  });
});

describe('parseMinutes', () => {
  it('should accept positive integers', () => {
    expect(parseMinutes('45')).toBe(45);
  });

  it.each(['0', '-5', '1.5', 'abc'])('should reject %s', (raw) => {
    expect(() => parseMinutes(raw)).toThrow(InvalidArgumentError);
  });
});

describe('JSON files', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'persona-desk-input-'));
    fs.writeFileSync(path.join(cwd, 'object.json'), '{"budget": 100}');
    fs.writeFileSync(path.join(cwd, 'list.json'), '[{"name": "A"}]');
    fs.writeFileSync(path.join(cwd, 'broken.json'), '{');
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  it('should resolve paths against cwd', () => {
    expect(readJsonFile('list.json', cwd)).toEqual([{ name: 'A' }]);
    expect(readJsonObject('object.json', cwd)).toEqual({ budget: 100 });
  });

  it('should raise InputFileError for missing or broken files', () => {
    expect(() => readJsonFile('missing.json', cwd)).toThrow(InputFileError);
    expect(() => readJsonFile('broken.json', cwd)).toThrow(/^Failed to read broken\.json: invalid JSON/);
    expect(() => readJsonObject('list.json', cwd)).toThrow('Failed to read list.json: expected a JSON object');
  });

  it('should warn instead of failing for optional files', () => {
    const warnings: string[] = [];
    expect(readOptionalJsonObject('list.json', cwd, (m) => warnings.push(m))).toEqual({});
    expect(readOptionalJsonObject(undefined, cwd, (m) => warnings.push(m))).toEqual({});
    expect(warnings).toEqual(['Failed to read list.json: expected a JSON object。空の内容で続行します。']);
  });
});
