/**
 * DeploymentHistory — append-only JSON-lines log of finished deployments.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { getLogger } from '../core/logger.js';
import { AsyncMutex } from '../core/mutex.js';
import { isMissing } from './artifact.js';
import { DeploymentRecordSchema, type Deployment, type DeploymentRecord } from './types.js';

export interface HistoryQuery {
  alias?: string;
  limit?: number;
}

export class DeploymentHistory {
  private readonly writeLock = new AsyncMutex();

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async append(deployment: Deployment): Promise<void> {
    const record: DeploymentRecord = DeploymentRecordSchema.parse(deployment);
    await this.writeLock.withLock(async () => {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, JSON.stringify(record) + '\n', 'utf-8');
    });
  }

  /**
   * Newest first. Lines that fail to parse are skipped with a warning.
   */
  async list(query: HistoryQuery = {}): Promise<DeploymentRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }

    const records: DeploymentRecord[] = [];
    const lines = raw.split('\n');
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]?.trim();
      if (!line) continue;
      const record = this.parseLine(line, i + 1);
      if (record && (!query.alias || record.alias === query.alias)) {
        records.push(record);
      }
    }

    records.reverse();
    return query.limit !== undefined ? records.slice(0, query.limit) : records;
  }

  private parseLine(line: string, lineNumber: number): DeploymentRecord | undefined {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      getLogger().warn({ path: this.filePath, line: lineNumber }, 'Skipping unreadable history line');
      return undefined;
    }
    const parsed = DeploymentRecordSchema.safeParse(json);
    if (!parsed.success) {
      getLogger().warn({ path: this.filePath, line: lineNumber }, 'Skipping malformed history line');
      return undefined;
    }
    return parsed.data;
  }
}
