/**
 * File reading collaborator
 *
 * The index reads bounded prefixes and the cache reads whole files; both go
 * through this contract so tests can count and fail reads.
 */
import { createReadStream, type Dirent } from "fs";
import { open, readdir, readFile, stat } from "fs/promises";
import { extname } from "path";
import {
  FileReadError,
  FileReadFailure,
  isFileReadError,
  toError,
} from "../errors/index.js";
import { logger } from "../utils.js";
import { resolveWithinRoot, validateProjectRoot } from "./path-validator.js";

/** Read access used by the File Memory Cache and the bot's /read */
export interface FileReader {
  /**
   * Read at most maxBytes from the start of a file.
   * A multi-byte character cut at the boundary is dropped.
   */
  readPrefix(path: string, maxBytes: number): Promise<string>;

  /**
   * Read a whole file as UTF-8
   * @throws FileReadError (DECODE when the bytes are not valid UTF-8)
   */
  readFull(path: string): Promise<string>;
}

/** A file found while walking the codebase */
export interface SourceFile {
  readonly path: string;
  readonly sizeBytes: number;
}

export interface ListFilesOptions {
  readonly maxDepth: number;
  readonly maxFileBytes: number;
}

/** Everything the File Index needs from the codebase */
export interface FileSource extends FileReader {
  /** Eligible files, sorted by path */
  listFiles(options: ListFilesOptions): Promise<SourceFile[]>;
  countLines(path: string): Promise<number>;
}

/** Directories never descended into */
export const IGNORED_DIRECTORIES: ReadonlySet<string> = new Set([
  ".git",
  "node_modules",
  "__pycache__",
  ".venv",
  "venv",
  "dist",
  "build",
  ".next",
  ".idea",
  ".vscode",
  "coverage",
]);

/** Extensions of files that are not source text */
export const BINARY_EXTENSIONS: ReadonlySet<string> = new Set([
  ".png", ".jpg", ".jpeg", ".gif", ".bmp", ".ico", ".webp", ".tiff",
  ".zip", ".tar", ".gz", ".tgz", ".bz2", ".xz", ".7z", ".rar",
  ".woff", ".woff2", ".ttf", ".otf", ".eot",
  ".o", ".a", ".so", ".dll", ".dylib", ".exe", ".class", ".jar", ".pyc", ".wasm",
  ".mp3", ".mp4", ".wav", ".ogg", ".mov", ".avi", ".pdf",
]);

const NEWLINE = 0x0a;

export function isBinaryPath(path: string): boolean {
  return BINARY_EXTENSIONS.has(extname(path).toLowerCase());
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function classifyFailure(error: unknown): FileReadFailure {
  switch (errnoCode(error)) {
    case "ENOENT":
    case "ENOTDIR":
      return FileReadFailure.NOT_FOUND;
    case "EACCES":
    case "EPERM":
      return FileReadFailure.PERMISSION_DENIED;
    default:
      return FileReadFailure.UNKNOWN;
  }
}

function toFileReadError(path: string, error: unknown): FileReadError {
  if (isFileReadError(error)) {
    return error;
  }
  const cause = toError(error);
  return new FileReadError(
    `Failed to read ${path}: ${cause.message}`,
    path,
    classifyFailure(error),
    cause
  );
}

/**
 * FileSource over the local filesystem, rooted at one directory
 */
export class NodeFileSource implements FileSource {
  private constructor(readonly root: string) {}

  /**
   * @throws IndexBuildError when the root is missing or not a directory
   */
  static async open(rootPath: string): Promise<NodeFileSource> {
    return new NodeFileSource(await validateProjectRoot(rootPath));
  }

  async readPrefix(path: string, maxBytes: number): Promise<string> {
    try {
      const absolute = await resolveWithinRoot(path, this.root);
      const handle = await open(absolute, "r");
      try {
        const buffer = Buffer.alloc(maxBytes);
        const { bytesRead } = await handle.read(buffer, 0, maxBytes, 0);
        return new TextDecoder("utf-8").decode(buffer.subarray(0, bytesRead), {
          stream: true,
        });
      } finally {
        await handle.close();
      }
    } catch (error) {
      throw toFileReadError(path, error);
    }
  }

  async readFull(path: string): Promise<string> {
    let bytes: Buffer;
    try {
      const absolute = await resolveWithinRoot(path, this.root);
      bytes = await readFile(absolute);
    } catch (error) {
      throw toFileReadError(path, error);
    }

    try {
      return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    } catch (error) {
      throw new FileReadError(
        `File is not valid UTF-8: ${path}`,
        path,
        FileReadFailure.DECODE,
        toError(error)
      );
    }
  }

  /**
   * Count lines by streaming newline bytes; a final line without a
   * trailing newline still counts, an empty file has zero lines
   */
  async countLines(path: string): Promise<number> {
    try {
      const absolute = await resolveWithinRoot(path, this.root);
      let newlines = 0;
      let lastByte: number | undefined;

      for await (const chunk of createReadStream(absolute)) {
        if (!Buffer.isBuffer(chunk)) {
          continue;
        }
        for (const byte of chunk) {
          if (byte === NEWLINE) newlines++;
        }
        if (chunk.length > 0) {
          lastByte = chunk[chunk.length - 1];
        }
      }

      if (lastByte === undefined) return 0;
      return lastByte === NEWLINE ? newlines : newlines + 1;
    } catch (error) {
      throw toFileReadError(path, error);
    }
  }

  async listFiles(options: ListFilesOptions): Promise<SourceFile[]> {
    const files: SourceFile[] = [];
    await this.walk("", 0, options, files);
    return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  private async walk(
    relativeDir: string,
    depth: number,
    options: ListFilesOptions,
    out: SourceFile[]
  ): Promise<void> {
    if (depth > options.maxDepth) {
      return;
    }

    const absoluteDir = relativeDir ? `${this.root}/${relativeDir}` : this.root;
    let entries: Dirent[];
    try {
      entries = await readdir(absoluteDir, { withFileTypes: true });
    } catch (error) {
      // An unreadable root is fatal; unreadable subdirectories are skipped
      if (!relativeDir) throw error;
      logger.warn(`Skipping unreadable directory ${relativeDir}: ${toError(error).message}`);
      return;
    }

    for (const entry of entries) {
      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;

      // Symlinks are neither files nor directories here, so they are skipped
      if (entry.isDirectory()) {
        if (!IGNORED_DIRECTORIES.has(entry.name)) {
          await this.walk(relativePath, depth + 1, options, out);
        }
        continue;
      }
      if (!entry.isFile() || isBinaryPath(entry.name)) {
        continue;
      }

      try {
        const { size } = await stat(`${this.root}/${relativePath}`);
        if (size <= options.maxFileBytes) {
          out.push({ path: relativePath, sizeBytes: size });
        } else {
          logger.debug(`Skipping large file ${relativePath} (${size} bytes)`);
        }
      } catch (error) {
        logger.warn(`Skipping unreadable file ${relativePath}: ${toError(error).message}`);
      }
    }
  }
}
