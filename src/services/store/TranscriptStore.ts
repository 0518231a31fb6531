import fs from 'node:fs/promises';
import path from 'node:path';
import { TranscriptRepository } from '../../core/contracts';
import { TranscriptRecord } from '../../types';

const TRANSCRIPT_EXTENSION = '.txt';

const pad = (value: number): string => String(value).padStart(2, '0');

/** Local time as `yyyy-MM-dd_HH-mm-ss`. */
export const formatTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
  `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;

interface StemOrder {
  base: string;
  suffix: number;
}

const parseStem = (stem: string): StemOrder => {
  const match = stem.match(/^(.*)_(\d+)$/);
  if (match && /_\d{2}-\d{2}-\d{2}$/.test(match[1])) {
    return { base: match[1], suffix: Number.parseInt(match[2], 10) };
  }

  return { base: stem, suffix: 1 };
};

// Newest first: the stem encodes the save time, and same-second saves carry _2, _3...
const newestFirst = (a: string, b: string): number => {
  const left = parseStem(a);
  const right = parseStem(b);
  if (left.base !== right.base) {
    return left.base < right.base ? 1 : -1;
  }

  return right.suffix - left.suffix;
};

const isMissing = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export class TranscriptStore implements TranscriptRepository {
  public constructor(public readonly directory: string) {}

  public async save(text: string, timestamp: Date = new Date()): Promise<string> {
    await fs.mkdir(this.directory, { recursive: true });

    const base = formatTimestamp(timestamp);
    for (let attempt = 1; ; attempt += 1) {
      const stem = attempt === 1 ? base : `${base}_${attempt}`;
      const filePath = path.join(this.directory, `${stem}${TRANSCRIPT_EXTENSION}`);
      try {
        await fs.writeFile(filePath, text, { encoding: 'utf8', flag: 'wx' });
        return filePath;
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
          continue;
        }

        throw error;
      }
    }
  }

  public async loadAll(): Promise<TranscriptRecord[]> {
    const stems = await this.listStems();
    const records: TranscriptRecord[] = [];

    for (const stem of stems) {
      const record = await this.read(stem);
      if (record) {
        records.push(record);
      }
    }

    return records;
  }

  public async loadRecent(limit: number): Promise<TranscriptRecord[]> {
    if (limit <= 0) {
      return [];
    }

    const stems = (await this.listStems()).slice(0, limit);
    const records: TranscriptRecord[] = [];

    for (const stem of stems) {
      const record = await this.read(stem);
      if (record) {
        records.push(record);
      }
    }

    return records;
  }

  public async count(): Promise<number> {
    return (await this.listStems()).length;
  }

  public async delete(timestamp: string): Promise<boolean> {
    try {
      await fs.unlink(path.join(this.directory, `${timestamp}${TRANSCRIPT_EXTENSION}`));
      return true;
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }

      throw error;
    }
  }

  private async listStems(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }

      throw error;
    }

    return entries
      .filter((entry) => entry.endsWith(TRANSCRIPT_EXTENSION))
      .map((entry) => entry.slice(0, -TRANSCRIPT_EXTENSION.length))
      .sort(newestFirst);
  }

  private async read(stem: string): Promise<TranscriptRecord | undefined> {
    const filePath = path.join(this.directory, `${stem}${TRANSCRIPT_EXTENSION}`);
    try {
      const text = await fs.readFile(filePath, 'utf8');
      return { timestamp: stem, text, path: filePath };
    } catch (error) {
      if (isMissing(error)) {
        return undefined;
      }

      throw error;
    }
  }
}
