/**
 * Error handling for FASTQ file discovery and I/O
 *
 * Every error thrown by this library derives from FastqFilesError and carries
 * a stable `code` alongside the human-readable message.
 */

import type { CompressionFormat } from "./types";

/**
 * Base error class for all fastq-files errors
 */
export class FastqFilesError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "FastqFilesError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid arguments or options
 */
export class ValidationError extends FastqFilesError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * A path expected to name an R1 FASTQ file does not match the R1 pattern
 *
 * Callers matching speculatively should check `isFastqR1` first.
 */
export class PatternMismatchError extends FastqFilesError {
  constructor(
    public readonly path: string,
    public readonly pattern: string = "R1 FASTQ"
  ) {
    super(`Path did not match ${pattern} pattern: ${path}`, "PATTERN_MISMATCH", path);
    this.name = "PatternMismatchError";
  }
}

/**
 * Internal contract violation; indicates a bug rather than bad input
 */
export class InvariantError extends FastqFilesError {
  constructor(message: string, context?: string) {
    super(message, "INVARIANT_VIOLATION", context);
    this.name = "InvariantError";
  }
}

/**
 * Compression/decompression errors
 */
export class CompressionError extends FastqFilesError {
  constructor(
    message: string,
    public readonly format: CompressionFormat,
    public readonly operation: "detect" | "decompress" | "compress" | "validate",
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", context);
    this.name = "CompressionError";
  }

  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}`,
      format,
      operation,
      `System error: ${errorMessage}`
    );
  }
}

/**
 * File I/O errors wrapping the platform's failure
 */
export class FileError extends FastqFilesError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "list" | "open",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", context);
    this.name = "FileError";
  }

  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the path is correct and exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("enotdir") || msg.includes("not a directory")) {
      return "Path points to a file, not a directory";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }
    return msg;
  }
}

/**
 * Stream processing errors
 */
export class StreamError extends FastqFilesError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", context);
    this.name = "StreamError";
  }
}
