/**
 * Helpers for the device -> host byte stream.
 *
 * The device output is an unframed byte stream: the boot greeting once,
 * then raw capture bytes.
 *
 * @module protocol/stream
 */

import { BOOT_GREETING } from './constants';

/** Boot greeting as bytes. */
export const GREETING_BYTES: readonly number[] = Array.from(Buffer.from(BOOT_GREETING, 'latin1'));

/**
 * Find the first occurrence of `needle` in `haystack`.
 *
 * @returns Start index, or -1 when absent.
 */
export function find_sequence(haystack: readonly number[], needle: readonly number[]): number {
  if (needle.length === 0) return 0;

  outer: for (let i = 0; i + needle.length <= haystack.length; i++) {
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) continue outer;
    }
    return i;
  }
  return -1;
}

/**
 * Accumulates received bytes and hands them out as a greeting or capture.
 *
 * Shared by the serial link and the simulated link so both cut the
 * stream the same way.
 */
export class RxAccumulator {
  private bytes: number[] = [];

  /** Number of buffered bytes. */
  get length(): number {
    return this.bytes.length;
  }

  push(data: Iterable<number>): void {
    for (const b of data) {
      this.bytes.push(b & 0xFF);
    }
  }

  /**
   * Drop everything up to and including the greeting.
   *
   * @returns True when the greeting was found.
   */
  consume_greeting(): boolean {
    const idx = find_sequence(this.bytes, GREETING_BYTES);
    if (idx < 0) return false;
    this.bytes = this.bytes.slice(idx + GREETING_BYTES.length);
    return true;
  }

  /** Remove and return up to `count` bytes from the front. */
  take(count: number): Uint8Array {
    const taken = this.bytes.slice(0, Math.max(0, count));
    this.bytes = this.bytes.slice(taken.length);
    return Uint8Array.from(taken);
  }

  /** Remove and return everything. */
  take_all(): Uint8Array {
    return this.take(this.bytes.length);
  }

  clear(): void {
    this.bytes = [];
  }
}
