import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface StreamSourceOptions {
  /** File name for metadata. Default: 'stream-input'. */
  readonly fileName?: string;
  /** Encoding for converting Buffer chunks to string. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
}

/**
 * Data source that wraps an `AsyncIterable` such as `process.stdin`.
 *
 * A stream can only be read once, so `sample()` buffers what it reads and
 * `read()` replays that buffer before continuing with the rest of the stream.
 */
export class StreamSource implements DataSource {
  private readonly iterator: AsyncIterator<string | Buffer>;
  private readonly meta: SourceMetadata;
  private readonly encoding: BufferEncoding;
  private readonly buffered: string[] = [];
  private exhausted = false;
  private consumed = false;

  constructor(stream: AsyncIterable<string | Buffer>, options?: StreamSourceOptions) {
    this.iterator = stream[Symbol.asyncIterator]();
    this.encoding = options?.encoding ?? 'utf-8';
    this.meta = { fileName: options?.fileName ?? 'stream-input' };
  }

  async *read(): AsyncIterable<string> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    yield* this.buffered.splice(0);

    for (;;) {
      const chunk = await this.next();
      if (chunk === undefined) return;
      yield chunk;
    }
  }

  async sample(maxBytes = 65536): Promise<string> {
    let totalBytes = this.buffered.reduce((sum, chunk) => sum + Buffer.byteLength(chunk, this.encoding), 0);

    while (totalBytes < maxBytes) {
      const chunk = await this.next();
      if (chunk === undefined) break;
      this.buffered.push(chunk);
      totalBytes += Buffer.byteLength(chunk, this.encoding);
    }

    return this.buffered.join('').slice(0, maxBytes);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }

  private async next(): Promise<string | undefined> {
    if (this.exhausted) return undefined;

    const result = await this.iterator.next();
    if (result.done === true) {
      this.exhausted = true;
      return undefined;
    }
    const chunk = result.value;
    return typeof chunk === 'string' ? chunk : chunk.toString(this.encoding);
  }
}
