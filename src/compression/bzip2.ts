/**
 * Bzip2 decompression through unbzip2-stream
 */

import { Readable } from "node:stream";
import unbzip2 from "unbzip2-stream";

/**
 * Wrap a bzip2-compressed byte stream in a decompressing one
 *
 * unbzip2-stream is a classic (through) stream, so it is wrapped back into a
 * streams2 Readable before crossing over to a web stream.
 */
export function wrapStream(stream: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
  const decompressed = Readable.fromWeb(stream).pipe(unbzip2());
  return Readable.toWeb(new Readable().wrap(decompressed));
}

export const Bzip2Decompressor = {
  format: "bzip2",
  wrapStream,
} as const;
