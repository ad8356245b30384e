/**
 * Dossier - Chunk Buffer
 *
 * Accumulates streamed text and hands it to a sink in sentence-sized pieces.
 */

export type ChunkSink = (chunk: string) => Promise<void> | void;

const SENTENCE_BREAKS = ['.', '!', '?', '\n', '。', '！', '？'];
export const MIN_CHUNK_LENGTH = 10;

export class ChunkBuffer {
  private accumulated = '';
  private pending = '';

  constructor(
    private readonly sink: ChunkSink,
    private readonly minLength: number = MIN_CHUNK_LENGTH
  ) {}

  /** Everything pushed so far, flushed or not. */
  get text(): string {
    return this.accumulated;
  }

  /**
   * Append a fragment. The unflushed buffer goes to the sink once it holds a
   * sentence break and is longer than the minimum length.
   */
  async push(fragment: string): Promise<void> {
    if (!fragment) return;
    this.accumulated += fragment;
    this.pending += fragment;

    if (this.pending.length > this.minLength && SENTENCE_BREAKS.some((ch) => this.pending.includes(ch))) {
      await this.flush();
    }
  }

  /** Send whatever is buffered, if anything. */
  async flush(): Promise<void> {
    if (!this.pending) return;
    const chunk = this.pending;
    this.pending = '';
    await this.sink(chunk);
  }
}
