import crypto from 'crypto';
import { logger } from '@/utils/logger';

/**
 * Identity of an upload: its name plus a digest of its bytes.
 */
export function fingerprint(fileName: string, content: Buffer): string {
  const digest = crypto.createHash('sha1').update(content).digest('hex');
  return `${fileName}:${digest}`;
}

/**
 * Holds at most one value. Setting a new key replaces the previous entry
 * wholesale; there is no expiry.
 */
export class CacheService<T> {
  private entry: { key: string; value: T; storedAt: string } | null = null;

  get(key: string): T | null {
    if (this.entry && this.entry.key === key) {
      logger.debug(`Cache hit: ${key}`);
      return this.entry.value;
    }
    logger.debug(`Cache miss: ${key}`);
    return null;
  }

  set(key: string, value: T): void {
    if (this.entry && this.entry.key !== key) {
      logger.debug(`Cache replaced: ${this.entry.key} -> ${key}`);
    }
    this.entry = { key, value, storedAt: new Date().toISOString() };
  }

  /** The stored value regardless of key. */
  current(): T | null {
    return this.entry ? this.entry.value : null;
  }

  clear(): void {
    this.entry = null;
    logger.info('Cache cleared');
  }

  getStats(): { keys: number; key: string | null; storedAt: string | null } {
    return {
      keys: this.entry ? 1 : 0,
      key: this.entry?.key ?? null,
      storedAt: this.entry?.storedAt ?? null
    };
  }
}
