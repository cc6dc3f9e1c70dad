/**
 * File Index
 *
 * Flat, read-only catalogue of the codebase built once per session.
 * Previews come from bounded prefix reads and line counts from streamed
 * newline counts, so building never holds a whole file in memory.
 */
import { extname } from "path";
import { IndexBuildError, toError } from "../errors/index.js";
import { logger } from "../utils.js";
import {
  NodeFileSource,
  type FileReader,
  type FileSource,
  type SourceFile,
} from "./file-reader.js";
import { toIndexPath } from "./path-validator.js";
import type { FileRecord } from "./types.js";

export interface FileIndexOptions {
  /** Characters kept as preview */
  readonly previewChars?: number;
  /** Files above this size are left out */
  readonly maxFileBytes?: number;
  readonly maxDepth?: number;
  /** Defaults to the local filesystem under rootPath */
  readonly source?: FileSource;
}

/** Files listed in a selection prompt before the remainder is summarized */
export const OVERVIEW_LIMIT = 200;

const DEFAULT_INDEX_OPTIONS = {
  previewChars: 500,
  maxFileBytes: 1_048_576,
  maxDepth: 20,
} as const;

/** UTF-8 needs at most four bytes per character */
const MAX_BYTES_PER_CHAR = 4;

export interface DirectoryGroup {
  /** Directory path, "" for the root */
  readonly directory: string;
  /** File names shown, sorted */
  readonly files: readonly string[];
  /** Files in the directory beyond the ones shown */
  readonly hiddenFiles: number;
}

export interface TreeView {
  readonly groups: readonly DirectoryGroup[];
  /** Directories beyond the ones shown */
  readonly hiddenDirectories: number;
}

function parentDirectory(path: string): string {
  const slash = path.lastIndexOf("/");
  return slash === -1 ? "" : path.substring(0, slash);
}

function baseName(path: string): string {
  return path.substring(path.lastIndexOf("/") + 1);
}

export class FileIndex {
  private readonly byPath: ReadonlyMap<string, FileRecord>;

  private constructor(
    readonly rootPath: string,
    private readonly entries: readonly FileRecord[]
  ) {
    this.byPath = new Map(entries.map((record) => [record.path, record]));
  }

  /**
   * Walk the codebase and record every eligible file
   *
   * @throws IndexBuildError if the root is missing or yields no files
   */
  static async build(
    rootPath: string,
    options: FileIndexOptions = {}
  ): Promise<FileIndex> {
    const previewChars = options.previewChars ?? DEFAULT_INDEX_OPTIONS.previewChars;
    const source = options.source ?? (await NodeFileSource.open(rootPath));

    let files: SourceFile[];
    try {
      files = await source.listFiles({
        maxDepth: options.maxDepth ?? DEFAULT_INDEX_OPTIONS.maxDepth,
        maxFileBytes: options.maxFileBytes ?? DEFAULT_INDEX_OPTIONS.maxFileBytes,
      });
    } catch (error) {
      const cause = toError(error);
      throw new IndexBuildError(
        `Failed to list codebase files: ${cause.message}`,
        rootPath,
        undefined,
        cause
      );
    }

    const records: FileRecord[] = [];
    const seen = new Set<string>();

    for (const file of files) {
      if (seen.has(file.path)) continue;
      seen.add(file.path);

      try {
        const prefix = await source.readPrefix(
          file.path,
          Math.max(previewChars * MAX_BYTES_PER_CHAR, 1)
        );
        // NUL in the first bytes marks a binary file without a known extension
        if (prefix.includes("\u0000")) {
          logger.debug(`Skipping binary file ${file.path}`);
          continue;
        }

        records.push({
          path: file.path,
          lineCount: await source.countLines(file.path),
          extension: extname(file.path),
          preview: prefix.substring(0, previewChars),
          sizeBytes: file.sizeBytes,
        });
      } catch (error) {
        logger.warn(`Failed to index ${file.path}: ${toError(error).message}`);
      }
    }

    if (records.length === 0) {
      throw new IndexBuildError(
        `No eligible files found under ${rootPath}`,
        rootPath
      );
    }

    logger.info(`Indexed ${records.length} files under ${rootPath}`);
    return new FileIndex(rootPath, records);
  }

  /** Index over records already in memory */
  static fromRecords(rootPath: string, records: readonly FileRecord[]): FileIndex {
    const unique = new Map<string, FileRecord>();
    for (const record of records) {
      if (!unique.has(record.path)) unique.set(record.path, record);
    }
    return new FileIndex(rootPath, [...unique.values()]);
  }

  get size(): number {
    return this.entries.length;
  }

  records(): readonly FileRecord[] {
    return this.entries;
  }

  lookup(path: string): FileRecord | undefined {
    const exact = this.byPath.get(path);
    if (exact) return exact;

    const normalized = toIndexPath(path);
    return normalized === undefined ? undefined : this.byPath.get(normalized);
  }

  has(path: string): boolean {
    return this.lookup(path) !== undefined;
  }

  /**
   * Records under a directory prefix; "" or "/" lists everything.
   * A prefix naming a directory matches whole path segments only.
   */
  listDirectory(pathPrefix: string): FileRecord[] {
    const prefix = toIndexPath(pathPrefix.replace(/^\/+/, ""));
    if (prefix === undefined) return [];
    if (prefix === "") return [...this.entries];

    return this.entries.filter(
      (record) => record.path === prefix || record.path.startsWith(`${prefix}/`)
    );
  }

  /**
   * Numbered listing for selection prompts:
   * `N. path (L lines, .ext)`, then "... and K more files"
   */
  overview(limit: number = OVERVIEW_LIMIT): string {
    const lines = this.entries
      .slice(0, limit)
      .map(
        (record, i) =>
          `${i + 1}. ${record.path} (${record.lineCount} lines, ${record.extension || "no extension"})`
      );

    if (this.entries.length > limit) {
      lines.push(`... and ${this.entries.length - limit} more files`);
    }
    return lines.join("\n");
  }

  /** Files grouped by parent directory, root first, then sorted */
  tree(maxDirs = 20, maxFilesPerDir = 5): TreeView {
    const byDirectory = new Map<string, string[]>();
    for (const record of this.entries) {
      const directory = parentDirectory(record.path);
      const names = byDirectory.get(directory) ?? [];
      names.push(baseName(record.path));
      byDirectory.set(directory, names);
    }

    const directories = [...byDirectory.keys()].sort((a, b) =>
      a === "" ? -1 : b === "" ? 1 : a.localeCompare(b)
    );
    const shown = directories.slice(0, maxDirs);

    return {
      groups: shown.map((directory) => {
        const names = (byDirectory.get(directory) ?? []).sort();
        return {
          directory,
          files: names.slice(0, maxFilesPerDir),
          hiddenFiles: Math.max(names.length - maxFilesPerDir, 0),
        };
      }),
      hiddenDirectories: directories.length - shown.length,
    };
  }
}

/**
 * Paths whose content contains the term, case-insensitively.
 * Unreadable files are skipped.
 */
export async function searchFiles(
  index: FileIndex,
  reader: FileReader,
  term: string
): Promise<string[]> {
  const needle = term.toLowerCase();
  if (!needle) return [];

  const matches: string[] = [];
  for (const record of index.records()) {
    try {
      const content = await reader.readFull(record.path);
      if (content.toLowerCase().includes(needle)) {
        matches.push(record.path);
      }
    } catch (error) {
      logger.debug(`Search skipped ${record.path}: ${toError(error).message}`);
    }
  }
  return matches;
}
