import { promises as fs } from 'fs';
import { join, dirname } from 'path';
import { randomUUID } from 'crypto';
import { logger } from '../core/logger';
import { RetryPolicy, withRetry } from './retry';

const isTransientFsError = (error: unknown): boolean => {
  const code = error instanceof Error && 'code' in error ? error.code : undefined;
  return code !== 'ENOENT' && code !== 'EISDIR' && code !== 'EACCES' && !(error instanceof SyntaxError);
};

// Safe JSON file read with retry; resolves null when the file does not exist
export async function readJsonFile(filePath: string, policy: RetryPolicy): Promise<unknown> {
  return withRetry(
    async () => {
      try {
        const data = await fs.readFile(filePath, 'utf8');
        return JSON.parse(data);
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
          return null;
        }
        throw error;
      }
    },
    policy,
    isTransientFsError,
    'File read',
    { filePath }
  );
}

// Atomic JSON file write with retry
export async function writeJsonAtomic(filePath: string, data: unknown, policy: RetryPolicy): Promise<void> {
  return withRetry(
    async () => {
      const jsonData = JSON.stringify(data, null, 2);
      const tempPath = join(dirname(filePath), `.${randomUUID()}.tmp`);

      try {
        // Write to temporary file first
        await fs.writeFile(tempPath, jsonData, 'utf8');

        // Atomic rename (this is atomic on most filesystems)
        await fs.rename(tempPath, filePath);

        logger.debug({ filePath }, 'File written atomically');
      } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
      }
    },
    policy,
    isTransientFsError,
    'Atomic file write',
    { filePath }
  );
}

// Safe directory creation with retry
export async function ensureDir(dirPath: string, policy: RetryPolicy): Promise<void> {
  return withRetry(
    async () => {
      await fs.mkdir(dirPath, { recursive: true });
    },
    policy,
    isTransientFsError,
    'Directory creation',
    { dirPath }
  );
}
