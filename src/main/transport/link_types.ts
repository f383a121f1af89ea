/**
 * Contract shared by the serial link and the simulated link.
 *
 * @module transport/link_types
 */

/** Why a capture receive finished. */
export type ReceiveReason = 'complete' | 'idle' | 'timeout';

/** Bytes gathered by {@link CaptureLink.receive_capture}. */
export interface CaptureResult {
  data: Uint8Array;
  /** True when the expected number of bytes arrived. */
  complete: boolean;
  reason: ReceiveReason;
}

/** Receive limits. */
export interface ReceiveOptions {
  /** Give up after this long in total. */
  timeout_ms?: number;
  /** Finish early once data has started and then stalled this long. */
  idle_timeout_ms?: number;
}

/** A host-side connection to a capture device. */
export interface CaptureLink {
  /** Send raw bytes to the device. */
  send(data: Uint8Array): void;
  /**
   * Wait for the boot greeting.
   *
   * @returns True when it was seen, false on timeout.
   */
  wait_for_greeting(timeout_ms?: number): Promise<boolean>;
  /** Collect `expected` capture bytes, or fewer if the link goes quiet. */
  receive_capture(expected: number, options?: ReceiveOptions): Promise<CaptureResult>;
  /** Let `ms` of device time pass. */
  pause(ms: number): Promise<void>;
}
