/**
 * Filesystem fixtures for tests: a scratch directory per test and helpers
 * to populate it
 */

import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";

export interface ScratchDirectory {
  readonly root: string;
  /** Absolute path of a path relative to the root */
  path(relativePath: string): string;
  /** Create a file (and its parent directories) */
  touch(relativePath: string, content?: string | Uint8Array): string;
  /** Create a directory (and its parents) */
  mkdir(relativePath: string): string;
  /** Create a symbolic link; the target is written as given */
  link(target: string, relativePath: string): string;
  remove(): void;
}

export function createScratchDirectory(prefix = "fastq-files-"): ScratchDirectory {
  const root = mkdtempSync(join(tmpdir(), prefix));

  return {
    root,
    path: (relativePath) => join(root, relativePath),
    touch(relativePath, content = "") {
      const filePath = join(root, relativePath);
      mkdirSync(dirname(filePath), { recursive: true });
      writeFileSync(filePath, content);
      return filePath;
    },
    mkdir(relativePath) {
      const directoryPath = join(root, relativePath);
      mkdirSync(directoryPath, { recursive: true });
      return directoryPath;
    },
    link(target, relativePath) {
      const linkPath = join(root, relativePath);
      mkdirSync(dirname(linkPath), { recursive: true });
      symlinkSync(target, linkPath);
      return linkPath;
    },
    remove() {
      rmSync(root, { recursive: true, force: true });
    },
  };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const results: T[] = [];
  for await (const item of source) {
    results.push(item);
  }
  return results;
}

export function streamOf(...chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(chunk);
      }
      controller.close();
    },
  });
}

export async function readAllText(stream: ReadableStream<Uint8Array>): Promise<string> {
  const decoder = new TextDecoder();
  let text = "";
  for await (const chunk of stream) {
    text += decoder.decode(chunk, { stream: true });
  }
  return text + decoder.decode();
}
