import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { CacheClient, CacheEntry, CacheWriteInput } from './cache.js';

interface MetadataFile {
  storedAt: string;
  metadata?: Record<string, unknown>;
}

export interface FileCacheOptions {
  /** Directory holding one subdirectory per namespace. Defaults to `.cache`. */
  baseDir?: string;
}

/** On-disk store for cached `/api/info` parent lookups: one body file and one metadata file per request checksum. */
export class FileCache implements CacheClient {
  private readonly baseDir: string;

  constructor(options: FileCacheOptions = {}) {
    this.baseDir = options.baseDir ?? '.cache';
  }

  async read(namespace: string, checksum: string): Promise<CacheEntry | null> {
    const { bodyPath, metaPath } = this.paths(namespace, checksum);

    try {
      const [body, metaRaw] = await Promise.all([
        fs.readFile(bodyPath, 'utf8'),
        fs.readFile(metaPath, 'utf8'),
      ]);
      const meta = parseMetadata(metaRaw);
      const entry: CacheEntry = {
        checksum,
        body,
        storedAt: meta.storedAt,
        ...(meta.metadata ? { metadata: meta.metadata } : {}),
      };
      return entry;
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }

      throw error;
    }
  }

  async write(namespace: string, entry: CacheWriteInput): Promise<void> {
    const { dir, bodyPath, metaPath } = this.paths(namespace, entry.checksum);
    await fs.mkdir(dir, { recursive: true });

    const metadata: MetadataFile = { storedAt: new Date().toISOString() };
    if (entry.metadata) {
      metadata.metadata = entry.metadata;
    }

    await Promise.all([
      fs.writeFile(bodyPath, entry.body, 'utf8'),
      fs.writeFile(metaPath, JSON.stringify(metadata, null, 2), 'utf8'),
    ]);
  }

  private paths(namespace: string, checksum: string) {
    const dir = path.join(this.baseDir, namespace);
    return {
      dir,
      bodyPath: path.join(dir, `${checksum}.body`),
      metaPath: path.join(dir, `${checksum}.meta.json`),
    };
  }
}

function parseMetadata(raw: string): MetadataFile {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || !('storedAt' in parsed) || typeof parsed.storedAt !== 'string') {
    throw new Error('Cache metadata is missing storedAt');
  }
  const metadata = 'metadata' in parsed && isRecord(parsed.metadata) ? parsed.metadata : undefined;
  return { storedAt: parsed.storedAt, ...(metadata ? { metadata } : {}) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
