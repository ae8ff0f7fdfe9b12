import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { InvalidPayloadError, PayloadNotFoundError } from '../errors.js';
import { publishAtomic } from '../fs/atomic.js';
import { silentLogger, type LoggerLike } from '../observability/logger.js';

export interface StoredPayload {
  name: string;
  createdAt: Date;
  size: number;
}

export interface SavedPayload {
  fileName: string;
  path: string;
}

const PREFIX = 'Webhook_';

// 20260301_093000_<32 hex>
export function newPayloadKey(now: Date = new Date()): string {
  const stamp = now.toISOString().slice(0, 19).replace(/[-:]/g, '').replace('T', '_');
  return `${stamp}_${randomUUID().replace(/-/g, '')}`;
}

/**
 * Flat directory of received assessment payloads, one JSON file each.
 */
export class PayloadStore {
  private readonly root: string;
  private readonly logger: LoggerLike;
  private initialized = false;

  constructor(root: string, logger: LoggerLike = silentLogger) {
    this.root = path.resolve(root);
    this.logger = logger;
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    if (!fs.existsSync(this.root)) {
      this.logger.debug('Creating payload directory', { path: this.root });
      await fs.promises.mkdir(this.root, { recursive: true, mode: 0o755 });
    }
    this.initialized = true;
  }

  getRoot(): string {
    return this.root;
  }

  // Only the base name is honoured, so callers cannot reach outside the store
  resolve(name: string): string {
    return path.join(this.root, path.basename(name));
  }

  async save(key: string, payload: unknown): Promise<SavedPayload> {
    await this.initialize();

    const fileName = `${PREFIX}${path.basename(key)}.json`;
    const filePath = this.resolve(fileName);
    await publishAtomic(filePath, JSON.stringify(payload, null, 2));

    this.logger.info('Payload stored', { fileName });
    return { fileName, path: filePath };
  }

  async list(): Promise<StoredPayload[]> {
    if (!fs.existsSync(this.root)) return [];

    const items = await fs.promises.readdir(this.root, { withFileTypes: true });
    const entries: StoredPayload[] = [];

    for (const item of items) {
      if (!item.isFile() || !item.name.endsWith('.json') || item.name.startsWith('.')) continue;
      const stat = await fs.promises.stat(path.join(this.root, item.name));
      entries.push({ name: item.name, createdAt: stat.mtime, size: stat.size });
    }

    return entries.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || a.name.localeCompare(b.name));
  }

  async read(name: string): Promise<unknown> {
    const fileName = path.basename(name);
    const filePath = this.resolve(fileName);

    let content: string;
    try {
      content = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new PayloadNotFoundError(fileName);
      }
      throw error;
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new InvalidPayloadError(`Stored payload ${fileName} is not valid JSON`, { cause: error });
    }
  }
}
