import { describe, it, expect, vi } from 'vitest';
import { ReturningGenerator } from '../../src/runner/returning-generator.js';
import { ValueNotAvailableError } from '../../src/exception/failures.js';

async function* countTo(n: number, onBody: () => void = () => {}): AsyncGenerator<number, string, undefined> {
  onBody();
  for (let i = 1; i <= n; i++) {
    yield i;
  }
  return `counted ${n}`;
}

describe('ReturningGenerator', () => {
  it('streams every item in order', async () => {
    const gen = new ReturningGenerator(countTo(3));
    const items: number[] = [];
    for await (const item of gen) {
      items.push(item);
    }
    expect(items).toEqual([1, 2, 3]);
  });

  it('throws ValueNotAvailableError before the stream is drained', async () => {
    const gen = new ReturningGenerator(countTo(2));
    expect(() => gen.value).toThrow(ValueNotAvailableError);

    await gen.next();
    expect(gen.exhausted).toBe(false);
    expect(() => gen.value).toThrow('Return value not available yet');
  });

  it('returns the same value on every read after exhaustion', async () => {
    const body = vi.fn();
    const gen = new ReturningGenerator(countTo(2, body));
    for await (const _ of gen) {
      // drain
    }

    expect(gen.exhausted).toBe(true);
    expect(gen.value).toBe('counted 2');
    expect(gen.value).toBe('counted 2');
    expect(await gen.exhaust()).toBe('counted 2');
    expect(body).toHaveBeenCalledTimes(1);
  });

  it('exhaust drains the remaining items and returns the value', async () => {
    const gen = new ReturningGenerator(countTo(4));
    const first = await gen.next();
    expect(first).toEqual({ value: 1, done: false });

    expect(await gen.exhaust()).toBe('counted 4');
  });

  it('is single pass: a second loop sees nothing', async () => {
    const gen = new ReturningGenerator(countTo(2));
    for await (const _ of gen) {
      // drain
    }
    const again: number[] = [];
    for await (const item of gen) {
      again.push(item);
    }
    expect(again).toEqual([]);
    expect(gen.value).toBe('counted 2');
  });

  it('runs the source cleanup when the consumer breaks early', async () => {
    const cleanup = vi.fn();
    async function* withCleanup(): AsyncGenerator<number, string, undefined> {
      try {
        yield 1;
        yield 2;
        return 'done';
      } finally {
        cleanup();
      }
    }

    const gen = new ReturningGenerator(withCleanup());
    for await (const item of gen) {
      if (item === 1) break;
    }

    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(gen.exhausted).toBe(false);
  });

  it('close releases the source', async () => {
    const cleanup = vi.fn();
    async function* withCleanup(): AsyncGenerator<number, string, undefined> {
      try {
        yield 1;
        yield 2;
        return 'done';
      } finally {
        cleanup();
      }
    }

    const gen = new ReturningGenerator(withCleanup());
    await gen.next();
    await gen.close();

    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(await gen.next()).toEqual({ value: undefined, done: true });
  });

  it('propagates errors from the source and keeps the value unavailable', async () => {
    async function* failing(): AsyncGenerator<number, string, undefined> {
      yield 1;
      throw new Error('boom');
    }

    const gen = new ReturningGenerator(failing());
    await expect(gen.exhaust()).rejects.toThrow('boom');
    expect(() => gen.value).toThrow(ValueNotAvailableError);
  });

  it('from() returns an existing wrapper unchanged', async () => {
    const gen = new ReturningGenerator(countTo(1));
    await gen.exhaust();

    const rewrapped = ReturningGenerator.from(gen);
    expect(rewrapped).toBe(gen);
    expect(rewrapped.value).toBe('counted 1');
  });

  it('from() keeps progress of a partially consumed wrapper', async () => {
    const gen = new ReturningGenerator(countTo(3));
    await gen.next();

    const rest: number[] = [];
    for await (const item of ReturningGenerator.from(gen)) {
      rest.push(item);
    }
    expect(rest).toEqual([2, 3]);
    expect(gen.value).toBe('counted 3');
  });

  it('from() wraps a plain generator', async () => {
    const gen = ReturningGenerator.from(countTo(2));
    expect(gen).toBeInstanceOf(ReturningGenerator);
    expect(await gen.exhaust()).toBe('counted 2');
  });
});
