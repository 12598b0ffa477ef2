/**
 * XZ decompression through the xz-decompress WASM decoder
 */

import { XzReadableStream } from "xz-decompress";

/**
 * Wrap an xz-compressed byte stream in a decompressing one
 */
export function wrapStream(stream: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
  return new XzReadableStream(stream);
}

export const XzDecompressor = {
  format: "xz",
  wrapStream,
} as const;
