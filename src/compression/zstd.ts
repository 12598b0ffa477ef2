/**
 * Zstandard decompression through the @hpcc-js/wasm-zstd WASM module
 *
 * The WASM decoder works on whole buffers, so the compressed input is
 * collected before it is decoded in one call.
 */

import { Zstd } from "@hpcc-js/wasm-zstd";
import { CompressionError } from "../errors";

const ZSTD_MAGIC = [0x28, 0xb5, 0x2f, 0xfd] as const;

let zstdModule: Promise<Zstd> | undefined;

/**
 * Load the WASM module once per process
 */
function loadZstd(): Promise<Zstd> {
  zstdModule ??= Zstd.load();
  return zstdModule;
}

function concatChunks(chunks: readonly Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

function hasZstdMagic(data: Uint8Array): boolean {
  return ZSTD_MAGIC.every((byte, index) => data[index] === byte);
}

/**
 * Decompress a complete zstd buffer
 *
 * @throws {CompressionError} If the data is not valid zstd
 */
export async function decompress(compressed: Uint8Array): Promise<Uint8Array> {
  if (!hasZstdMagic(compressed)) {
    throw new CompressionError("Invalid zstd magic bytes", "zstd", "decompress");
  }
  const zstd = await loadZstd();
  try {
    return zstd.decompress(compressed);
  } catch (error) {
    throw CompressionError.fromSystemError("zstd", "decompress", error);
  }
}

/**
 * Compress a buffer; used to produce `.zst` fixtures and outputs
 */
export async function compress(data: Uint8Array, level = 3): Promise<Uint8Array> {
  const zstd = await loadZstd();
  try {
    return zstd.compress(data, level);
  } catch (error) {
    throw CompressionError.fromSystemError("zstd", "compress", error);
  }
}

/**
 * Wrap a zstd-compressed byte stream in a decompressing one
 */
export function wrapStream(stream: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
  const chunks: Uint8Array[] = [];

  return stream.pipeThrough(
    new TransformStream<Uint8Array, Uint8Array>({
      transform(chunk) {
        chunks.push(chunk);
      },
      async flush(controller) {
        controller.enqueue(await decompress(concatChunks(chunks)));
      },
    })
  );
}

export const ZstdDecompressor = {
  format: "zstd",
  wrapStream,
} as const;
