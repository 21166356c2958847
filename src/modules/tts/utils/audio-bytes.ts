/**
 * Collect whatever the SDK hands back for a bytes request into one Buffer.
 * Depending on runtime it is a Node stream, a web ReadableStream, an
 * ArrayBuffer or a Response-like object.
 */

interface ArrayBufferSource {
  arrayBuffer(): Promise<ArrayBuffer>;
}

function isAsyncIterable(value: object): value is AsyncIterable<unknown> {
  return Symbol.asyncIterator in value;
}

function isArrayBufferSource(value: object): value is ArrayBufferSource {
  return 'arrayBuffer' in value && typeof value.arrayBuffer === 'function';
}

function chunkToBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  if (chunk instanceof ArrayBuffer) {
    return Buffer.from(chunk);
  }
  throw new TypeError(`Unexpected audio chunk type: ${typeof chunk}`);
}

export async function collectAudioBytes(source: unknown): Promise<Buffer> {
  if (source instanceof Uint8Array || source instanceof ArrayBuffer) {
    return chunkToBuffer(source);
  }

  if (typeof source === 'object' && source !== null) {
    if (isAsyncIterable(source)) {
      const chunks: Buffer[] = [];
      for await (const chunk of source) {
        chunks.push(chunkToBuffer(chunk));
      }
      return Buffer.concat(chunks);
    }

    if (isArrayBufferSource(source)) {
      return Buffer.from(await source.arrayBuffer());
    }
  }

  throw new TypeError('Speech synthesis returned no readable audio');
}
