import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { OutputStore, safeFileSegment } from './output';

describe('output', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'persona-desk-out-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should replace spaces and slashes in file segments', () => {
    expect(safeFileSegment('新規 事業/計画')).toBe('新規_事業_計画');
  });

  it('should write UTF-8 content under the category directory', () => {
    const store = new OutputStore(dir);
    const saved = store.save('documents', 'proposal_新規事業.md', '# 提案書\n');

    expect(saved).toBe(path.join(dir, 'documents', 'proposal_新規事業.md'));
    expect(fs.readFileSync(saved, 'utf-8')).toBe('# 提案書\n');
  });
});
