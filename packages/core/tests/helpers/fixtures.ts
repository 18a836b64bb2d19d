/**
 * Shared test doubles: an in-memory knowledge repository and record builders.
 */

import type { KnowledgeRepository, DecodedKnowledge } from '../../src/knowledge/types.js';
import type { ProblemRecord } from '../../src/types.js';

export class MemoryRepository implements KnowledgeRepository {
  saved: ProblemRecord[][] = [];
  failSaves = false;
  closed = false;

  constructor(private records: ProblemRecord[] = [], private readonly skipped: DecodedKnowledge['skipped'] = []) {}

  async load(): Promise<DecodedKnowledge> {
    return { records: this.records.map((r) => ({ ...r })), skipped: this.skipped };
  }

  async save(records: readonly ProblemRecord[]): Promise<void> {
    if (this.failSaves) throw new Error('disk is read-only');
    this.records = [...records];
    this.saved.push([...records]);
  }

  describe(): string {
    return 'memory:test';
  }

  close(): void {
    this.closed = true;
  }

  get current(): readonly ProblemRecord[] {
    return this.records;
  }
}

export function record(
  id: string,
  en: string[],
  answerEn: string,
  extra: { np?: string[]; answerNp?: string; autoFix?: boolean; learned?: boolean } = {},
): ProblemRecord {
  return {
    id,
    aliases: { en, np: extra.np ?? [] },
    answers: extra.answerNp === undefined ? { en: answerEn } : { en: answerEn, np: extra.answerNp },
    autoFix: extra.autoFix ?? false,
    learned: extra.learned ?? false,
  };
}

/** The wifi / printer knowledge base used across tests. */
export function sampleRecords(): ProblemRecord[] {
  return [
    record('wifi0001', ['wifi not working', 'no internet'], 'Restart your router.', {
      np: ['इन्टरनेट चल्दैन'],
      answerNp: 'राउटर पुनः सुरु गर्नुहोस्।',
      autoFix: true,
    }),
    record('print002', ['printer jam', 'paper stuck'], 'Open the tray and remove the paper.'),
    record('disk0003', ['disk full', 'low disk space'], 'Empty the recycle bin.'),
  ];
}
