import { describe, it, expect, vi, afterEach } from 'vitest';

interface MockListEntry {
  path: string;
  manufacturer?: string;
  vendorId?: string;
  productId?: string;
}

interface MockState {
  listing: MockListEntry[];
  list_error: string | null;
}

const mock = vi.hoisted((): MockState => ({ listing: [], list_error: null }));

vi.mock('serialport', () => {
  class MockSerialPort {
    static async list(): Promise<MockListEntry[]> {
      if (mock.list_error !== null) throw new Error(mock.list_error);
      return mock.listing;
    }
  }

  return { SerialPort: MockSerialPort };
});

import { pick_port, scan_ports } from '../port_scanner';
import type { PortInfo } from '../port_scanner';

describe('scan_ports', () => {
  afterEach(() => {
    mock.listing = [];
    mock.list_error = null;
  });

  it('labels ports with manufacturer and USB ids where known', async () => {
    mock.listing = [
      { path: '/dev/ttyUSB0', manufacturer: 'FTDI', vendorId: '0403', productId: '6010' },
      { path: '/dev/ttyS0' }
    ];

    expect(await scan_ports()).toEqual([
      {
        path: '/dev/ttyUSB0',
        vid: '0403',
        pid: '6010',
        manufacturer: 'FTDI',
        label: 'FTDI - /dev/ttyUSB0 [0403:6010]'
      },
      {
        path: '/dev/ttyS0',
        vid: undefined,
        pid: undefined,
        manufacturer: undefined,
        label: '/dev/ttyS0'
      }
    ]);
  });

  it('returns an empty list when enumeration fails', async () => {
    mock.list_error = 'permission denied';
    expect(await scan_ports()).toEqual([]);
  });
});

describe('pick_port', () => {
  const usb: PortInfo = { path: '/dev/ttyUSB0', vid: '0403', pid: '6010', label: 'usb' };
  const uart: PortInfo = { path: '/dev/ttyS0', label: 'uart' };

  it('picks the only port', () => {
    expect(pick_port([uart])).toBe(uart);
  });

  it('refuses to guess between several ports', () => {
    expect(pick_port([usb, uart])).toBeNull();
    expect(pick_port([])).toBeNull();
  });

  it('matches the vendor id case-insensitively', () => {
    expect(pick_port([uart, usb], '0403')).toBe(usb);
    expect(pick_port([uart, { ...usb, vid: '1A86' }], '1a86')?.path).toBe('/dev/ttyUSB0');
    expect(pick_port([uart, usb], 'ffff')).toBeNull();
  });
});
