import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { SQLiteRepository } from '../../../src/knowledge/sqlite-repository.js';
import { SCHEMA_VERSION } from '../../../src/knowledge/migrations.js';
import { NotFoundError } from '../../../src/errors.js';
import { sampleRecords } from '../../helpers/fixtures.js';

describe('SQLiteRepository', () => {
  let db: Database.Database;
  let repo: SQLiteRepository;

  beforeEach(() => {
    db = new Database(':memory:');
    repo = new SQLiteRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('applies migrations up to the current schema version', () => {
    expect(db.pragma('user_version', { simple: true })).toBe(SCHEMA_VERSION);
  });

  it('loads an empty knowledge base from a fresh database', async () => {
    expect(await repo.load()).toEqual({ records: [], skipped: [] });
  });

  it('round-trips records in order, including extra fields', async () => {
    const records = sampleRecords();
    const first = records[0];
    if (first) first.extra = { category: 'network' };

    await repo.save(records);
    const { records: loaded } = await repo.load();

    expect(loaded).toEqual(records);
  });

  it('replaces previous contents on save', async () => {
    await repo.save(sampleRecords());
    await repo.save(sampleRecords().slice(1));

    const { records } = await repo.load();
    expect(records.map((r) => r.id)).toEqual(['print002', 'disk0003']);
  });

  it('skips rows with corrupt alias columns', async () => {
    await repo.save(sampleRecords().slice(0, 1));
    db.prepare("UPDATE problems SET aliases = 'not json' WHERE id = 'wifi0001'").run();

    const { records, skipped } = await repo.load();
    expect(records).toEqual([]);
    expect(skipped).toHaveLength(1);
    expect(skipped[0]?.position).toBe(0);
  });

  it('keeps undecodable rows through later saves', async () => {
    await repo.save(sampleRecords().slice(0, 2));
    db.prepare("UPDATE problems SET aliases = 'not json' WHERE id = 'wifi0001'").run();

    const { records } = await repo.load();
    await repo.save([...records, ...sampleRecords().slice(2)]);

    const rows = db.prepare('SELECT id, aliases FROM problems ORDER BY position ASC').all();
    expect(rows).toEqual([
      { id: 'wifi0001', aliases: 'not json' },
      { id: 'print002', aliases: '["printer jam","paper stuck"]' },
      { id: 'disk0003', aliases: '["disk full","low disk space"]' },
    ]);
  });

  it('does not close a database it was handed', () => {
    repo.close();
    expect(db.open).toBe(true);
  });

  describe('open', () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'deskmate-sqlite-'));
    });

    afterEach(async () => {
      await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it('refuses a missing file unless asked to create it', () => {
      expect(() => SQLiteRepository.open(path.join(tmpDir, 'kb.db'))).toThrow(NotFoundError);
    });

    it('creates the file and persists across reopen', async () => {
      const file = path.join(tmpDir, 'kb.db');
      const created = SQLiteRepository.open(file, { create: true });
      await created.save(sampleRecords());
      created.close();

      const reopened = SQLiteRepository.open(file);
      const { records } = await reopened.load();
      reopened.close();

      expect(records).toEqual(sampleRecords());
    });
  });
});
