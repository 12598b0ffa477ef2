/**
 * Read-only filesystem access: existence checks, directory walks and
 * decompressing file streams
 *
 * All I/O goes through the Effect platform `FileSystem` service; the public
 * functions run their program and return Promises. Nothing is cached, so
 * every call observes the filesystem as it is at that moment.
 */

import { join } from "node:path";
import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Option, Stream } from "effect";
import { CompressionDetector, createDecompressor } from "../compression";
import { FileError, ValidationError } from "../errors";
import type { FilePath, OpenOptions } from "../types";
import { FilePathSchema, OpenOptionsSchema } from "../types";
import { runWithPlatform } from "./runtime";

const DEFAULT_OPEN_OPTIONS: Required<Omit<OpenOptions, "compressionFormat">> = {
  autoDecompress: true,
  bufferSize: 65536,
};

/**
 * A directory entry with the type of what it points to
 */
interface DirectoryEntry {
  readonly name: string;
  readonly path: FilePath;
  readonly isDirectory: boolean;
}

// =============================================================================
// PRIVATE HELPERS
// =============================================================================

function validatePath(path: string): FilePath {
  const result = FilePathSchema(path);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid file path: ${result.summary}`, path);
  }
  return result;
}

function mergeOptions(options: OpenOptions): OpenOptions & typeof DEFAULT_OPEN_OPTIONS {
  const result = OpenOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid open options: ${result.summary}`);
  }
  return { ...DEFAULT_OPEN_OPTIONS, ...options };
}

/**
 * Sort key placing each entry where its full path sorts: a directory's
 * contents all share the `name/` prefix
 */
function sortKey(entry: DirectoryEntry): string {
  return entry.isDirectory ? `${entry.name}/` : entry.name;
}

/**
 * Stat a path, with none for a path that is gone
 */
function statIfPresent(fs: FileSystem.FileSystem, path: FilePath) {
  return fs.stat(path).pipe(
    Effect.map((info) => Option.some(info)),
    Effect.catchTag("SystemError", (error) =>
      error.reason === "NotFound" ? Effect.succeedNone : Effect.fail(error)
    )
  );
}

/**
 * Type of one directory entry, or none when it is skipped
 *
 * Symbolic links are followed to find out whether they name a regular file
 * but never descended into. A link whose target cannot be stat'ed (dangling
 * or looping) is skipped, as is an entry removed since the listing.
 */
function describeEntry(fs: FileSystem.FileSystem, name: string, path: FilePath) {
  return Effect.gen(function* () {
    const isLink = Option.isSome(yield* Effect.option(fs.readLink(path)));

    if (isLink) {
      const target = yield* Effect.option(fs.stat(path));
      return Option.isSome(target) && target.value.type !== "Directory"
        ? Option.some<DirectoryEntry>({ name, path, isDirectory: false })
        : Option.none<DirectoryEntry>();
    }

    const info = yield* statIfPresent(fs, path);
    return Option.map(
      info,
      (value): DirectoryEntry => ({ name, path, isDirectory: value.type === "Directory" })
    );
  });
}

async function listDirectory(directory: FilePath): Promise<DirectoryEntry[]> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const names = yield* fs.readDirectory(directory);
    const entries: DirectoryEntry[] = [];
    for (const name of names) {
      const entry = yield* describeEntry(fs, name, join(directory, name));
      if (Option.isSome(entry)) {
        entries.push(entry.value);
      }
    }
    return entries;
  });

  try {
    const entries = await runWithPlatform(program);
    return entries.sort((a, b) => {
      const left = sortKey(a);
      const right = sortKey(b);
      return left < right ? -1 : left > right ? 1 : 0;
    });
  } catch (error) {
    throw FileError.fromSystemError("list", directory, error);
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Check if a path exists at all (file, directory or anything else)
 *
 * @throws {FileError} If the check itself fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.exists(validatedPath);
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Check if a path is an existing regular file (symlinks followed)
 *
 * @throws {FileError} If the path exists but cannot be inspected
 */
export async function isFile(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Check if a path is an existing directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "Directory";
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Recursively list every non-directory entry under a directory
 *
 * Lazy: one directory is read at a time as the iteration advances. Entries
 * come out in lexicographic order of their full path. The directory itself
 * is not yielded. Symbolic links to files are yielded; links to directories
 * are not followed and dangling links are skipped.
 *
 * @throws {FileError} If a directory cannot be read
 *
 * @example
 * ```typescript
 * for await (const path of walkFiles('runs/2024-01')) {
 *   console.log(path);
 * }
 * ```
 */
export async function* walkFiles(directory: string): AsyncGenerator<FilePath> {
  const validatedPath = validatePath(directory);

  for (const entry of await listDirectory(validatedPath)) {
    if (entry.isDirectory) {
      yield* walkFiles(entry.path);
    } else {
      yield entry.path;
    }
  }
}

/**
 * Open a file as a byte stream, decompressing according to its suffix
 *
 * `.gz`, `.bz2`, `.xz` and `.zst` files are decompressed; anything else is
 * read as is. An explicit `compressionFormat` overrides the suffix.
 *
 * @throws {FileError} If the path is not a regular file or cannot be opened
 */
export async function openDecompressed(
  path: string,
  options: OpenOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  if (!(await isFile(validatedPath))) {
    throw new FileError(`Not a regular file: ${validatedPath}`, validatedPath, "open");
  }

  let stream: ReadableStream<Uint8Array>;
  try {
    stream = await runWithPlatform(
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        return Stream.toReadableStream(
          fs.stream(validatedPath, { chunkSize: mergedOptions.bufferSize })
        );
      })
    );
  } catch (error) {
    throw FileError.fromSystemError("open", validatedPath, error);
  }

  if (!mergedOptions.autoDecompress) {
    return stream;
  }

  const format =
    mergedOptions.compressionFormat ?? CompressionDetector.fromExtension(validatedPath);
  return format === "none" ? stream : createDecompressor(format).wrapStream(stream);
}
