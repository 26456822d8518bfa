import { Writer } from "./writer";

/** Default number of idle writers kept for reuse. */
const DEFAULT_MAX_RETAINED = 16;

/** Default initial capacity of pooled writers. */
const DEFAULT_WRITER_CAPACITY = 8192;

/** Default largest writer kept for reuse (1 MiB). */
const DEFAULT_MAX_RETAINED_CAPACITY = 1 << 20;

/**
 * Options for WriterPool configuration.
 */
export interface WriterPoolOptions {
  /** Maximum number of idle writers kept. Default: 16 */
  maxRetained?: number;
  /** Initial capacity of newly created writers. Default: 8192 */
  initialCapacity?: number;
  /** Writers that grew beyond this many bytes are dropped on release. Default: 1 MiB */
  maxRetainedCapacity?: number;
}

/**
 * WriterPool is a free-list of scratch writers shared between encode calls.
 *
 * A checked-out writer belongs to its caller until it is released; bytes that
 * must outlive the checkout are copied with `toBytes()` first.
 *
 * @example
 * ```typescript
 * const pool = new WriterPool();
 * const bytes = pool.use((writer) => {
 *   writer.writeInt32(42);
 *   return writer.toBytes();
 * });
 * ```
 */
export class WriterPool {
  private readonly free: Writer[] = [];
  private readonly maxRetained: number;
  private readonly initialCapacity: number;
  private readonly maxRetainedCapacity: number;

  constructor(options: WriterPoolOptions = {}) {
    this.maxRetained = options.maxRetained ?? DEFAULT_MAX_RETAINED;
    this.initialCapacity = options.initialCapacity ?? DEFAULT_WRITER_CAPACITY;
    this.maxRetainedCapacity = options.maxRetainedCapacity ?? DEFAULT_MAX_RETAINED_CAPACITY;
  }

  /**
   * Returns the number of idle writers.
   */
  get idle(): number {
    return this.free.length;
  }

  /**
   * Checks out a writer, reusing an idle one when available.
   */
  acquire(): Writer {
    return this.free.pop() ?? new Writer(this.initialCapacity);
  }

  /**
   * Returns a writer to the pool. Writers beyond the retention limit, or grown
   * past `maxRetainedCapacity`, are dropped.
   */
  release(writer: Writer): void {
    writer.reset();
    if (writer.capacity > this.maxRetainedCapacity) {
      return;
    }
    if (this.free.length < this.maxRetained && !this.free.includes(writer)) {
      this.free.push(writer);
    }
  }

  /**
   * Runs `fn` with a checked-out writer and releases it afterwards.
   */
  use<T>(fn: (writer: Writer) => T): T {
    const writer = this.acquire();
    try {
      return fn(writer);
    } finally {
      this.release(writer);
    }
  }
}
