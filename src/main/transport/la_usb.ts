/**
 * Logic analyzer USB serial connection.
 *
 * The device speaks an unframed byte stream in both directions: single
 * command bytes (plus 4-byte payloads) from the host, and the boot
 * greeting followed by raw capture bytes from the device. Incoming bytes
 * are accumulated until a greeting wait or capture receive claims them,
 * and are also re-emitted as `'data'` events.
 *
 * One greeting wait or capture receive may be pending at a time.
 */

import { SerialPort } from 'serialport';
import { EventEmitter } from 'events';
import {
  CAPTURE_IDLE_TIMEOUT_MS,
  CAPTURE_TIMEOUT_MS,
  DEFAULT_BAUD_RATE,
  GREETING_TIMEOUT_MS
} from '../protocol/constants';
import { RxAccumulator } from '../protocol/stream';
import type { CaptureLink, CaptureResult, ReceiveOptions } from './link_types';

/**
 * Events emitted by {@link LaUsb}.
 *
 * - `'data'` : Raw bytes as received (Uint8Array).
 * - `'error'`: Serial port error.
 * - `'close'`: Serial port closed.
 */
export interface LaUsbEvents {
  data: (chunk: Uint8Array) => void;
  error: (err: Error) => void;
  close: () => void;
}

/** Receive operation waiting on incoming bytes. */
interface PendingReceive {
  /** Re-check after new bytes were buffered. */
  on_data: () => void;
  /** Abort because the port went away. */
  cancel: (err: Error) => void;
}

/**
 * Manages a raw serial connection to the capture device.
 *
 * Usage:
 * ```ts
 * const la = new LaUsb();
 * await la.connect('/dev/ttyUSB0');
 * await la.wait_for_greeting();
 * la.send(build_start());
 * const result = await la.receive_capture(BUFFER_CAPACITY);
 * la.disconnect();
 * ```
 */
export class LaUsb extends EventEmitter implements CaptureLink {
  private port: SerialPort | null = null;

  /** Bytes received and not yet claimed. */
  private rx = new RxAccumulator();

  private pending: PendingReceive | null = null;

  /** Removes this link's listeners from `port`. */
  private detach: (() => void) | null = null;

  /**
   * Open a serial connection to the device.
   *
   * @param path - OS serial port path (e.g., "COM3" or "/dev/ttyUSB0").
   * @param baud - Baud rate. Defaults to 115200.
   * @throws If the port is already connected, or if the open fails.
   */
  async connect(path: string, baud: number = DEFAULT_BAUD_RATE): Promise<void> {
    if (this.port) {
      throw new Error('LaUsb: already connected, call disconnect() first');
    }

    this.rx.clear();

    let port: SerialPort;
    try {
      port = new SerialPort({ path, baudRate: baud, autoOpen: false });
    } catch (err) {
      throw new Error(`LaUsb: failed to create serial port: ${error_message(err)}`);
    }

    const detach = this._attach(port);
    try {
      await open_port(port);
    } catch (err) {
      detach();
      throw new Error(`LaUsb: failed to open ${path}: ${error_message(err)}`);
    }

    this.port = port;
    this.detach = detach;
  }

  /**
   * Close the serial connection.
   *
   * A pending greeting wait or receive is rejected. Safe to call when
   * already disconnected.
   */
  disconnect(): void {
    this.rx.clear();
    this._cancel_pending('LaUsb: disconnected');

    const port = this._release();
    if (!port || !port.isOpen) {
      return;
    }

    try {
      port.close();
    } catch (err) {
      this.emit('error', new Error(`LaUsb: error during disconnect: ${error_message(err)}`));
    }
  }

  /**
   * Send raw bytes to the device.
   *
   * @throws If not connected.
   */
  send(data: Uint8Array): void {
    if (!this.port || !this.port.isOpen) {
      throw new Error('LaUsb: not connected');
    }

    this.port.write(Buffer.from(data), (err) => {
      if (err) {
        this.emit('error', new Error(`LaUsb: send failed: ${err.message}`));
      }
    });
  }

  /**
   * Wait until every byte written so far has left the OS buffer.
   *
   * @throws If not connected.
   */
  drain(): Promise<void> {
    const port = this.port;
    if (!port || !port.isOpen) {
      return Promise.reject(new Error('LaUsb: not connected'));
    }

    return new Promise<void>((resolve, reject) => {
      port.drain((err) => {
        if (err) {
          reject(new Error(`LaUsb: drain failed: ${err.message}`));
          return;
        }
        resolve();
      });
    });
  }

  /** Whether the serial connection is currently open. */
  is_connected(): boolean {
    return this.port !== null && this.port.isOpen;
  }

  /** Number of received bytes not yet claimed. */
  buffered(): number {
    return this.rx.length;
  }

  /**
   * Wait for the boot greeting, discarding everything up to it.
   *
   * @returns True when the greeting arrived, false on timeout.
   */
  wait_for_greeting(timeout_ms: number = GREETING_TIMEOUT_MS): Promise<boolean> {
    this._assert_no_pending();

    if (this.rx.consume_greeting()) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve(false);
      }, timeout_ms);

      this.pending = {
        on_data: () => {
          if (this.rx.consume_greeting()) {
            clearTimeout(timer);
            this.pending = null;
            resolve(true);
          }
        },
        cancel: (err) => {
          clearTimeout(timer);
          this.pending = null;
          reject(err);
        }
      };
    });
  }

  /**
   * Collect a capture of `expected` bytes.
   *
   * Resolves with whatever arrived when the total timeout expires, or when
   * data started flowing and then stalled for `idle_timeout_ms`. Bytes
   * beyond `expected` stay buffered.
   */
  receive_capture(expected: number, options: ReceiveOptions = {}): Promise<CaptureResult> {
    this._assert_no_pending();

    const timeout_ms = options.timeout_ms ?? CAPTURE_TIMEOUT_MS;
    const idle_timeout_ms = options.idle_timeout_ms ?? CAPTURE_IDLE_TIMEOUT_MS;

    if (this.rx.length >= expected) {
      return Promise.resolve({ data: this.rx.take(expected), complete: true, reason: 'complete' });
    }

    return new Promise<CaptureResult>((resolve, reject) => {
      let idle_timer: ReturnType<typeof setTimeout> | null = null;

      const finish = (result: CaptureResult): void => {
        clearTimeout(total_timer);
        if (idle_timer !== null) clearTimeout(idle_timer);
        this.pending = null;
        resolve(result);
      };

      const finish_partial = (reason: 'idle' | 'timeout'): void => {
        finish({ data: this.rx.take(expected), complete: false, reason });
      };

      const total_timer = setTimeout(() => finish_partial('timeout'), timeout_ms);

      const restart_idle = (): void => {
        if (idle_timer !== null) clearTimeout(idle_timer);
        idle_timer = setTimeout(() => finish_partial('idle'), idle_timeout_ms);
      };

      if (this.rx.length > 0) restart_idle();

      this.pending = {
        on_data: () => {
          if (this.rx.length >= expected) {
            finish({ data: this.rx.take(expected), complete: true, reason: 'complete' });
            return;
          }
          restart_idle();
        },
        cancel: (err) => {
          clearTimeout(total_timer);
          if (idle_timer !== null) clearTimeout(idle_timer);
          this.pending = null;
          reject(err);
        }
      };
    });
  }

  /** Wait `ms` of wall-clock time. */
  pause(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  /** Buffer incoming bytes and wake the pending operation. */
  private on_serial_data(buf: Buffer): void {
    this.rx.push(buf);
    this.emit('data', new Uint8Array(buf));
    this.pending?.on_data();
  }

  /** Route the port's events to this link; returns the undo. */
  private _attach(port: SerialPort): () => void {
    const on_data = (buf: Buffer): void => this.on_serial_data(buf);
    const on_error = (err: Error): void => {
      this.emit('error', err);
    };
    const on_close = (): void => {
      // Only the port currently held may tear the link down.
      if (this.port !== port) return;
      this._release();
      this._cancel_pending('LaUsb: port closed');
      this.emit('close');
    };

    port.on('data', on_data);
    port.on('error', on_error);
    port.on('close', on_close);

    return () => {
      port.off('data', on_data);
      port.off('error', on_error);
      port.off('close', on_close);
    };
  }

  /** Drop the held port and its listeners, returning it. */
  private _release(): SerialPort | null {
    const port = this.port;
    this.detach?.();
    this.detach = null;
    this.port = null;
    return port;
  }

  private _assert_no_pending(): void {
    if (this.pending) {
      throw new Error('LaUsb: a receive is already in progress');
    }
  }

  private _cancel_pending(message: string): void {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.cancel(new Error(message));
    }
  }
}

function error_message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function open_port(port: SerialPort): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    port.open((err) => (err ? reject(err) : resolve()));
  });
}
