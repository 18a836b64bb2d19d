import { describe, it, expect } from 'vitest';
import { QueryHistory } from '../../src/history.js';
import { UnmatchedLog } from '../../src/unmatched-log.js';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

describe('QueryHistory', () => {
  it('stamps entries and keeps them oldest first', () => {
    const history = new QueryHistory(20, () => new Date('2026-01-02T03:04:05.000Z'));

    expect(history.record('printer jam', 'en')).toEqual({
      timestamp: '2026-01-02T03:04:05.000Z',
      query: 'printer jam',
      lang: 'en',
    });
    history.record('इन्टरनेट', 'np');

    expect(history.list().map((e) => e.query)).toEqual(['printer jam', 'इन्टरनेट']);
    expect(history.size).toBe(2);
  });

  it('drops the oldest entries beyond the limit', () => {
    const history = new QueryHistory(3);
    for (const query of ['a', 'b', 'c', 'd', 'e']) history.record(query, 'en');

    expect(history.list().map((e) => e.query)).toEqual(['c', 'd', 'e']);
  });

  it('keeps at least one entry', () => {
    const history = new QueryHistory(0);
    history.record('a', 'en');
    history.record('b', 'en');
    expect(history.list().map((e) => e.query)).toEqual(['b']);
  });

  it('hands out copies', () => {
    const history = new QueryHistory();
    history.record('a', 'en');
    const listed = history.list();

    history.record('b', 'en');

    expect(listed).toHaveLength(1);
    expect(history.size).toBe(2);
  });
});

describe('UnmatchedLog', () => {
  it('appends JSON lines and reads them back, skipping damaged lines', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'deskmate-unmatched-'));
    const log = new UnmatchedLog(path.join(dir, 'nested', 'unmatched.jsonl'));

    await expect(log.read()).resolves.toEqual([]);

    await log.append('screen is black', 'en', new Date('2026-01-01T00:00:00.000Z'));
    await fs.appendFile(log.filePath, '{"timestamp":\n', 'utf-8');
    await log.append('स्क्रिन कालो', 'np', new Date('2026-01-01T00:01:00.000Z'));

    await expect(log.read()).resolves.toEqual([
      { timestamp: '2026-01-01T00:00:00.000Z', query: 'screen is black', lang: 'en' },
      { timestamp: '2026-01-01T00:01:00.000Z', query: 'स्क्रिन कालो', lang: 'np' },
    ]);
    await fs.rm(dir, { recursive: true, force: true });
  });
});
