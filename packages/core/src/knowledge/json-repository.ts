/**
 * @module knowledge/json-repository
 * Knowledge base stored as a pretty-printed JSON array on disk.
 *
 * Writes go to a sibling temp file that is renamed over the target, so a
 * reader never sees a half-written file. Elements the last `load` could not
 * decode are written back verbatim at their original positions.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { FormatError, NotFoundError, errorMessage } from '../errors.js';
import type { ProblemRecord } from '../types.js';
import { decodeRecords, encodeRecord } from './codec.js';
import type { DecodedKnowledge, KnowledgeRepository } from './types.js';

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export class JsonFileRepository implements KnowledgeRepository {
  readonly filePath: string;
  /** Undecodable elements from the last load, by original position. */
  private unreadable: Array<{ position: number; element: unknown }> = [];

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async load(): Promise<DecodedKnowledge> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw new NotFoundError(`Knowledge base not found: ${this.filePath}`, { path: this.filePath });
      }
      throw err;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (err) {
      throw new FormatError(`Knowledge base is not valid JSON: ${this.filePath}: ${errorMessage(err)}`, {
        path: this.filePath,
      });
    }

    const decoded = decodeRecords(payload, this.filePath);
    const elements: unknown[] = Array.isArray(payload) ? payload : [];
    this.unreadable = decoded.skipped.map(({ position }) => ({ position, element: elements[position] }));
    return decoded;
  }

  async save(records: readonly ProblemRecord[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    const tmpPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;
    const body = `${JSON.stringify(this.withUnreadable(records.map(encodeRecord)), null, 2)}\n`;

    try {
      await fs.writeFile(tmpPath, body, 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
  }

  describe(): string {
    return `json:${this.filePath}`;
  }

  private withUnreadable(encoded: unknown[]): unknown[] {
    const out = [...encoded];
    for (const { position, element } of this.unreadable) {
      out.splice(Math.min(position, out.length), 0, element);
    }
    return out;
  }

  close(): void {
    // nothing held open between calls
  }
}
