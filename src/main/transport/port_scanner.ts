/**
 * USB serial port scanner.
 *
 * Enumerates serial ports through the `serialport` package so the user
 * can pick the one the capture device enumerated as.
 */

import { SerialPort } from 'serialport';

/** Metadata for a single USB serial port. */
export interface PortInfo {
  /** OS device path (e.g., COM3 on Windows, /dev/ttyUSB0 on Linux). */
  path: string;

  /** USB Vendor ID (hex string, e.g., "0403"). */
  vid?: string;

  /** USB Product ID (hex string, e.g., "6010"). */
  pid?: string;

  /** Manufacturer string reported by the USB device. */
  manufacturer?: string;

  /** Human-readable label combining manufacturer and path. */
  label: string;
}

/**
 * List available serial ports.
 *
 * @returns One {@link PortInfo} per detected port; empty when enumeration
 *   fails (e.g. missing permissions).
 */
export async function scan_ports(): Promise<PortInfo[]> {
  let raw_ports: Awaited<ReturnType<typeof SerialPort.list>>;
  try {
    raw_ports = await SerialPort.list();
  } catch {
    return [];
  }

  return raw_ports.map((p) => {
    const manufacturer = p.manufacturer ?? undefined;
    const ids = p.vendorId && p.productId ? ` [${p.vendorId}:${p.productId}]` : '';

    return {
      path: p.path,
      vid: p.vendorId ?? undefined,
      pid: p.productId ?? undefined,
      manufacturer,
      label: `${manufacturer ? `${manufacturer} - ` : ''}${p.path}${ids}`
    };
  });
}

/**
 * Pick the port to use when none was named: the only one, or the first
 * whose vendor ID matches.
 *
 * @returns The chosen port, or null when the choice is ambiguous.
 */
export function pick_port(ports: PortInfo[], vid?: string): PortInfo | null {
  if (vid) {
    const wanted = vid.toLowerCase();
    return ports.find((p) => p.vid?.toLowerCase() === wanted) ?? null;
  }
  return ports.length === 1 ? ports[0] : null;
}
