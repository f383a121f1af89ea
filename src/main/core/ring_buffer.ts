/**
 * Capture ring buffer.
 *
 * Fixed-capacity byte store with independent write and read cursors that
 * share one storage array and one clear signal. Each tick accepts at most
 * one write and one read. Read data is registered: it appears in
 * `read_data` of the state returned by the tick that issued the read.
 *
 * Flag behaviour:
 *   - `full` is set once the buffer holds `capacity` unread samples; with
 *     no reads that is exactly `capacity` accepted writes since clear.
 *   - `empty` is set when a read consumes the last written byte, and is
 *     released without a read on a tick where it is set while unread
 *     samples exist.
 *   - `clear` wins over a same-tick read or write.
 *
 * `storage` is the buffer's arena. It is allocated once and written in
 * place by accepted writes; every other register is copied per tick.
 *
 * @module core/ring_buffer
 */

import { BUFFER_CAPACITY } from '../protocol/constants';

/** Ring buffer registers and storage. */
export interface RingBufferState {
  /** Backing store, `capacity` bytes long. */
  readonly storage: Uint8Array;
  readonly capacity: number;
  write_cursor: number;
  read_cursor: number;
  /** Accepted writes since the last clear. */
  sample_count: number;
  /** Accepted reads since the last clear. */
  read_count: number;
  full: boolean;
  empty: boolean;
  /** Byte returned by the most recent accepted read. */
  read_data: number;
}

/** Requests presented to the buffer on one tick. */
export interface RingBufferRequests {
  write: boolean;
  write_data: number;
  read: boolean;
  clear: boolean;
}

/** Requests with nothing asserted. */
const NO_REQUESTS: RingBufferRequests = {
  write: false,
  write_data: 0,
  read: false,
  clear: false
};

/**
 * Create an empty buffer.
 *
 * @param capacity - Number of one-byte slots (at least 2).
 * @throws If the capacity is not an integer of at least 2.
 */
export function create_ring_buffer(capacity: number = BUFFER_CAPACITY): RingBufferState {
  if (!Number.isInteger(capacity) || capacity < 2) {
    throw new Error(`RingBuffer: capacity must be an integer >= 2, got ${capacity}`);
  }

  return {
    storage: new Uint8Array(capacity),
    capacity,
    write_cursor: 0,
    read_cursor: 0,
    sample_count: 0,
    read_count: 0,
    full: false,
    empty: true,
    read_data: 0
  };
}

/**
 * Advance the buffer by one tick.
 *
 * @param state - Registers committed at the end of the previous tick.
 * @param req - Requests for this tick.
 * @returns Registers committed at the end of this tick.
 */
export function tick_ring_buffer(
  state: RingBufferState,
  req: RingBufferRequests
): RingBufferState {
  if (req.clear) {
    return {
      ...state,
      write_cursor: 0,
      read_cursor: 0,
      sample_count: 0,
      read_count: 0,
      full: false,
      empty: true
    };
  }

  const next: RingBufferState = { ...state };

  // Read side first: storage is read before this tick's write lands.
  if (req.read && !state.empty) {
    next.read_data = state.storage[state.read_cursor];
    next.read_cursor = (state.read_cursor + 1) % state.capacity;
    next.read_count = state.read_count + 1;
    next.empty = next.read_count >= state.sample_count;
  } else if (state.empty && state.sample_count > state.read_count) {
    next.empty = false;
  }

  if (req.write && !state.full) {
    state.storage[state.write_cursor] = req.write_data & 0xFF;
    next.write_cursor = (state.write_cursor + 1) % state.capacity;
    next.sample_count = state.sample_count + 1;
  }

  next.full = next.sample_count - next.read_count >= state.capacity;

  return next;
}

/** Issue a lone write for one tick. */
export function buffer_write(state: RingBufferState, byte: number): RingBufferState {
  return tick_ring_buffer(state, { ...NO_REQUESTS, write: true, write_data: byte });
}

/** Issue a lone read for one tick; the byte lands in `read_data`. */
export function buffer_read(state: RingBufferState): RingBufferState {
  return tick_ring_buffer(state, { ...NO_REQUESTS, read: true });
}

/** Issue a lone clear for one tick. */
export function buffer_clear(state: RingBufferState): RingBufferState {
  return tick_ring_buffer(state, { ...NO_REQUESTS, clear: true });
}

/** Advance one tick with no requests. */
export function buffer_idle(state: RingBufferState): RingBufferState {
  return tick_ring_buffer(state, NO_REQUESTS);
}

/** Number of written samples not yet read. */
export function buffer_occupancy(state: RingBufferState): number {
  return state.sample_count - state.read_count;
}
