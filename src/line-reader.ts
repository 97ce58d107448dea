import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';
import type { Readable } from 'node:stream';

/**
 * Pull-style line reader over an engine's stdout.
 * `next()` resolves with the next trimmed line, or null once the stream has
 * ended and every buffered line has been consumed.
 */
export class LineReader {
  private readonly rl: Interface;
  private readonly buffered: string[] = [];
  private readonly waiters: Array<(line: string | null) => void> = [];
  private ended = false;

  constructor(input: Readable) {
    this.rl = createInterface({ input, crlfDelay: Infinity });
    this.rl.on('line', (line) => this.push(line.trim()));
    this.rl.on('close', () => this.end());
  }

  next(): Promise<string | null> {
    const line = this.buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Stop reading. Lines already buffered are still returned by next(). */
  close(): void {
    this.rl.close();
  }

  private push(line: string): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(line);
    } else {
      this.buffered.push(line);
    }
  }

  private end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) waiter(null);
  }
}
