// worldcore/core/IdentityAllocator.ts

export type CounterKind = "handle" | "sessionObject" | "skillObject";

export type IdentityBases = Record<CounterKind, bigint>;

/**
 * Starting points of the three id spaces. Session and skill object ids sit
 * in separate high ranges so they never meet each other or externally
 * assigned ids. Whether the client actually needs disjoint ranges is not
 * known; the ranges are kept apart anyway.
 */
export const DEFAULT_IDENTITY_BASES: IdentityBases = {
  handle: 0n,
  sessionObject: 0x0000_e1a9_0000_0000n,
  skillObject: 0x0000_54b6_0000_0000n,
};

/**
 * Highest allowed base per counter. Object ids must fit a signed 64-bit
 * cell; handles are handed out as numbers, so they stay exact doubles.
 */
export const MAX_IDENTITY_BASES: IdentityBases = {
  handle: BigInt(Number.MAX_SAFE_INTEGER),
  sessionObject: 2n ** 63n - 1n,
  skillObject: 2n ** 63n - 1n,
};

const SLOTS: Record<CounterKind, number> = {
  handle: 0,
  sessionObject: 1,
  skillObject: 2,
};

export const COUNTER_KINDS: readonly CounterKind[] = ["handle", "sessionObject", "skillObject"];

const CELL_BYTES = BigInt64Array.BYTES_PER_ELEMENT;
const BUFFER_BYTES = COUNTER_KINDS.length * CELL_BYTES;

/**
 * Three monotonic 64-bit counters.
 *
 * Cells live in a SharedArrayBuffer and are bumped with Atomics.add, so the
 * same buffer can be handed to worker threads and every thread still draws from one sequence per counter.
 */
export class IdentityAllocator {
  private readonly cells: BigInt64Array;

  private constructor(private readonly shared: SharedArrayBuffer) {
    this.cells = new BigInt64Array(shared, 0, COUNTER_KINDS.length);
  }

  static create(bases: IdentityBases = DEFAULT_IDENTITY_BASES): IdentityAllocator {
    for (const kind of COUNTER_KINDS) {
      if (bases[kind] < 0n || bases[kind] > MAX_IDENTITY_BASES[kind]) {
        throw new RangeError(
          `Identity base for ${kind} out of range: ${bases[kind]} (max ${MAX_IDENTITY_BASES[kind]})`
        );
      }
    }

    const allocator = new IdentityAllocator(new SharedArrayBuffer(BUFFER_BYTES));
    for (const kind of COUNTER_KINDS) {
      Atomics.store(allocator.cells, SLOTS[kind], bases[kind]);
    }
    return allocator;
  }

  /**
   * Wraps counters that already live in `buffer` (typically received from
   * the main thread via workerData). The current values are left as they are.
   */
  static attach(buffer: SharedArrayBuffer): IdentityAllocator {
    if (buffer.byteLength < BUFFER_BYTES) {
      throw new RangeError(
        `Identity buffer too small: ${buffer.byteLength} bytes, need ${BUFFER_BYTES}`
      );
    }
    return new IdentityAllocator(buffer);
  }

  get buffer(): SharedArrayBuffer {
    return this.shared;
  }

  /** Increments the counter and returns the new value. */
  next(kind: CounterKind): bigint {
    return Atomics.add(this.cells, SLOTS[kind], 1n) + 1n;
  }

  /** Last value handed out (or the base, if nothing was allocated yet). */
  peek(kind: CounterKind): bigint {
    return Atomics.load(this.cells, SLOTS[kind]);
  }
}
