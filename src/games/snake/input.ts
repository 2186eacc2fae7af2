/**
 * Keyboard input for Snake
 *
 * Raw terminal bytes are read with a bounded wait and decoded into a small
 * command alphabet. The wait is also what paces the game: an empty input
 * stream costs one full wait per turn, buffered bytes cost nothing.
 */

export type Command = 'up' | 'down' | 'left' | 'right' | 'quit' | 'toggle-pause' | 'none';

export const ESC = 0x1b;

const KEY_COMMANDS: Partial<Record<number, Command>> = {
  0x71: 'quit',         // q
  0x70: 'toggle-pause', // p
};

const ARROW_COMMANDS: Partial<Record<number, Command>> = {
  0x41: 'up',    // A
  0x42: 'down',  // B
  0x43: 'right', // C
  0x44: 'left',  // D
};

/**
 * Read primitive with a timeout
 */
export interface ByteSource {
  /**
   * Resolves as soon as `count` bytes are available, or once `timeoutMs`
   * has passed with whatever arrived by then (possibly nothing).
   */
  read(count: number, timeoutMs: number): Promise<Uint8Array>;
}

interface PendingRead {
  count: number;
  resolve: (bytes: Uint8Array) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * ByteSource fed by pushes, e.g. from a terminal's onData event
 */
export class ByteQueue implements ByteSource {
  private buffer: number[] = [];
  private pending: PendingRead | null = null;
  private closed = false;
  private readonly encoder = new TextEncoder();

  get size(): number {
    return this.buffer.length;
  }

  push(data: string | Uint8Array): void {
    if (this.closed) return;
    const bytes = typeof data === 'string' ? this.encoder.encode(data) : data;
    for (const byte of bytes) this.buffer.push(byte);
    if (this.pending && this.buffer.length >= this.pending.count) {
      this.settle();
    }
  }

  read(count: number, timeoutMs: number): Promise<Uint8Array> {
    if (this.pending) {
      return Promise.reject(new Error('ByteQueue already has a pending read'));
    }
    if (this.closed || this.buffer.length >= count) {
      return Promise.resolve(this.take(count));
    }
    return new Promise(resolve => {
      const timer = setTimeout(() => this.settle(), timeoutMs);
      this.pending = { count, resolve, timer };
    });
  }

  /**
   * Stop accepting input and release a pending read immediately
   */
  close(): void {
    this.closed = true;
    if (this.pending) this.settle();
  }

  private settle(): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.resolve(this.take(pending.count));
  }

  private take(count: number): Uint8Array {
    return Uint8Array.from(this.buffer.splice(0, count));
  }
}

/**
 * Command for a single key byte outside an escape sequence
 */
export function decodeKey(byte: number): Command {
  return KEY_COMMANDS[byte] ?? 'none';
}

/**
 * Command for the bytes read after ESC. Only the last byte matters, so
 * both `[A` and `OA` style arrows decode.
 */
export function decodeEscapeTail(bytes: Uint8Array): Command {
  if (bytes.length === 0) return 'none';
  return ARROW_COMMANDS[bytes[bytes.length - 1]] ?? 'none';
}

/**
 * Two-state decoder: idle, or just saw ESC and expects an arrow tail
 */
export class InputDecoder {
  constructor(
    private readonly source: ByteSource,
    private readonly waitMs: number,
  ) {}

  async next(): Promise<Command> {
    const first = await this.source.read(1, this.waitMs);
    if (first.length === 0) return 'none';
    if (first[0] !== ESC) return decodeKey(first[0]);

    const tail = await this.source.read(2, this.waitMs);
    return decodeEscapeTail(tail);
  }
}
