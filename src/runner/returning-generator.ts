import { ValueNotAvailableError } from '../exception/failures.js';

type Resolution<R> = { done: false } | { done: true; value: R };

/**
 * Pairs a lazy stream of progress items with the single value the producing
 * generator returns.
 *
 * Iteration is single pass. Leaving a `for await` early closes the source, so
 * a later loop sees nothing; only manual {@link next} calls keep the stream
 * open between consumers. The terminal value becomes readable
 * through {@link value} once the stream is drained, and stays the same on
 * every read.
 */
export class ReturningGenerator<Y, R> implements AsyncIterable<Y> {
  private resolution: Resolution<R> = { done: false };
  private readonly iterator: AsyncGenerator<Y, void, undefined>;

  constructor(private readonly source: AsyncGenerator<Y, R, undefined>) {
    this.iterator = this.drive();
  }

  /** Wrap a generator; an existing ReturningGenerator is returned as-is. */
  static from<Y, R>(
    source: AsyncGenerator<Y, R, undefined> | ReturningGenerator<Y, R>,
  ): ReturningGenerator<Y, R> {
    return source instanceof ReturningGenerator ? source : new ReturningGenerator(source);
  }

  get exhausted(): boolean {
    return this.resolution.done;
  }

  get value(): R {
    if (!this.resolution.done) {
      throw new ValueNotAvailableError();
    }
    return this.resolution.value;
  }

  [Symbol.asyncIterator](): AsyncGenerator<Y, void, undefined> {
    return this.iterator;
  }

  async next(): Promise<IteratorResult<Y, void>> {
    return this.iterator.next();
  }

  /** Drain whatever is left, discarding items, and return the terminal value. */
  async exhaust(): Promise<R> {
    if (!this.resolution.done) {
      for await (const _ of this.iterator) {
        // discard
      }
    }
    return this.value;
  }

  /** Stop early and let the source run its cleanup. */
  async close(): Promise<void> {
    await this.iterator.return();
  }

  private async *drive(): AsyncGenerator<Y, void, undefined> {
    const value = yield* this.source;
    this.resolution = { done: true, value };
  }
}
