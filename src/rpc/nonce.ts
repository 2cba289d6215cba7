// This module issues strictly increasing request ids from one counter shared by all client clones.

const COUNTER_BYTES = BigInt64Array.BYTES_PER_ELEMENT;

/**
 * Fetch-and-increment counter over a `SharedArrayBuffer`, so the same buffer can
 * back clients in worker threads without a lock.
 */
export class NonceCounter {
  public readonly buffer: SharedArrayBuffer;
  private readonly cell: BigInt64Array;

  private constructor(buffer: SharedArrayBuffer) {
    this.buffer = buffer;
    this.cell = new BigInt64Array(buffer, 0, 1);
  }

  public static create(): NonceCounter {
    return new NonceCounter(new SharedArrayBuffer(COUNTER_BYTES));
  }

  // This factory attaches to a buffer previously exported with `buffer`, e.g. from a worker's workerData.
  public static fromBuffer(buffer: SharedArrayBuffer): NonceCounter {
    if (buffer.byteLength < COUNTER_BYTES) {
      throw new RangeError(`Nonce buffer must hold at least ${COUNTER_BYTES} bytes.`);
    }

    return new NonceCounter(buffer);
  }

  // Takes the current value and advances the counter in one atomic step.
  public next(): number {
    return Number(Atomics.add(this.cell, 0, 1n));
  }

  public peek(): number {
    return Number(Atomics.load(this.cell, 0));
  }
}
