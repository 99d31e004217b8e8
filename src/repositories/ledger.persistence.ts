import { join } from 'path';
import { logger } from '../core/logger';
import { ensureDir, readJsonFile, writeJsonAtomic } from '../utils/fsSafe';
import { RetryPolicy } from '../utils/retry';
import { parseLedgerData } from './ledger.schema';
import { LedgerData, LedgerPersistence } from './ledger.types';

/**
 * Keeps the whole ledger in one JSON document, replaced by
 * write-to-temp-then-rename on every commit.
 */
export class JsonFilePersistence implements LedgerPersistence {
  private readonly filePath: string;

  constructor(private readonly dataDir: string, private readonly retryPolicy: RetryPolicy) {
    this.filePath = join(dataDir, 'ledger.json');
  }

  async load(): Promise<LedgerData | null> {
    await ensureDir(this.dataDir, this.retryPolicy);
    const raw = await readJsonFile(this.filePath, this.retryPolicy);
    if (raw === null) {
      logger.info({ filePath: this.filePath }, 'No ledger file found, starting empty');
      return null;
    }
    return parseLedgerData(raw);
  }

  async save(data: LedgerData): Promise<void> {
    await ensureDir(this.dataDir, this.retryPolicy);
    await writeJsonAtomic(this.filePath, data, this.retryPolicy);
  }
}

// In-process stand-in used by tests and DATA_DIR=:memory:
export class MemoryPersistence implements LedgerPersistence {
  private stored: LedgerData | null;
  saves = 0;

  constructor(initial: LedgerData | null = null) {
    this.stored = initial === null ? null : structuredClone(initial);
  }

  async load(): Promise<LedgerData | null> {
    return this.stored === null ? null : structuredClone(this.stored);
  }

  async save(data: LedgerData): Promise<void> {
    this.stored = structuredClone(data);
    this.saves++;
  }
}
