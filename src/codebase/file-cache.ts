/**
 * File Memory Cache
 *
 * Session-scoped map from path to (possibly truncated) content. Entries are
 * only ever added; `wipe()` is the single way to remove them. Concurrent
 * loads of the same path share one read.
 */
import { FileReadError, FileReadFailure, isFileReadError, toError } from "../errors/index.js";
import { logger } from "../utils.js";
import type { FileReader } from "./file-reader.js";
import { DEFAULT_TRUNCATION, type CacheEntry, type TruncationPolicy } from "./types.js";

/** Elision marker placed between the kept head and tail */
export function truncationMarker(elidedChars: number): string {
  return `\n\n... (truncated ${elidedChars} chars) ...\n\n`;
}

/**
 * Apply the truncation policy to raw file text.
 * Text of exactly maxChars is kept verbatim.
 */
export function truncateContent(
  raw: string,
  policy: TruncationPolicy = DEFAULT_TRUNCATION
): { content: string; truncated: boolean } {
  if (raw.length <= policy.maxChars) {
    return { content: raw, truncated: false };
  }

  const elided = raw.length - policy.headChars - policy.tailChars;
  const tail = policy.tailChars > 0 ? raw.slice(-policy.tailChars) : "";
  return {
    content: raw.slice(0, policy.headChars) + truncationMarker(elided) + tail,
    truncated: true,
  };
}

export interface CacheStats {
  readonly size: number;
  readonly hits: number;
  readonly misses: number;
  /** Successful reads from the file reader */
  readonly loads: number;
}

export class FileMemoryCache {
  private readonly entries = new Map<string, CacheEntry>();
  /** In-flight loads, keyed by path */
  private readonly pending = new Map<string, Promise<CacheEntry>>();
  /** Bumped by wipe() so loads started earlier are not stored */
  private generation = 0;
  private hits = 0;
  private misses = 0;
  private loads = 0;

  constructor(
    private readonly reader: FileReader,
    private readonly policy: TruncationPolicy = DEFAULT_TRUNCATION
  ) {}

  /**
   * Return the cached entry, loading and truncating it on first use
   * @throws FileReadError when the read fails; nothing is cached then
   */
  async get(path: string): Promise<CacheEntry> {
    const cached = this.entries.get(path);
    if (cached) {
      this.hits++;
      return cached;
    }

    const pending = this.pending.get(path);
    if (pending) {
      this.hits++;
      return pending;
    }

    this.misses++;
    const promise = this.load(path, this.generation);
    this.pending.set(path, promise);

    try {
      return await promise;
    } finally {
      if (this.pending.get(path) === promise) {
        this.pending.delete(path);
      }
    }
  }

  private async load(path: string, generation: number): Promise<CacheEntry> {
    let raw: string;
    try {
      raw = await this.reader.readFull(path);
    } catch (error) {
      const failure = isFileReadError(error)
        ? error
        : new FileReadError(
            `Failed to read ${path}: ${toError(error).message}`,
            path,
            FileReadFailure.UNKNOWN,
            toError(error)
          );
      logger.warn(`Cache load failed for ${path}: ${failure.message}`);
      throw failure;
    }

    this.loads++;
    const { content, truncated } = truncateContent(raw, this.policy);
    const entry: CacheEntry = {
      path,
      content,
      truncated,
      originalLength: raw.length,
    };

    if (generation === this.generation) {
      this.entries.set(path, entry);
    }
    logger.debug(
      `Cached ${path} (${raw.length} chars${truncated ? `, truncated to ${content.length}` : ""})`
    );
    return entry;
  }

  has(path: string): boolean {
    return this.entries.has(path);
  }

  /** Cached entry without loading */
  peek(path: string): CacheEntry | undefined {
    return this.entries.get(path);
  }

  /** Cached paths in insertion order */
  snapshot(): string[] {
    return [...this.entries.keys()];
  }

  /** Drop every entry; only called on an explicit user request */
  wipe(): number {
    const removed = this.entries.size;
    this.entries.clear();
    this.pending.clear();
    this.generation++;
    logger.info(`File memory cache wiped (${removed} entries removed)`);
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): CacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      loads: this.loads,
    };
  }
}
