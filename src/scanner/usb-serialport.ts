/**
 * USB enumeration through the serialport library (macOS, Windows)
 * Only USB serial devices are visible this way.
 */

import type { Enumerator, RawUsbDevice } from "./interface";
import { parseHexId } from "./usb";

/**
 * Serial port information (subset of SerialPort.list() entries)
 */
export interface SerialPortListing {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  vendorId?: string;
  productId?: string;
}

/**
 * Function to list serial ports (injectable for testing)
 */
export type ListPortsFn = () => Promise<SerialPortListing[]>;

/**
 * Default port listing using serialport library, loaded on first use
 */
export async function defaultListPorts(): Promise<SerialPortListing[]> {
  const { SerialPort } = await import("serialport");
  return SerialPort.list();
}

export function serialPortEnumerator(listPorts: ListPortsFn = defaultListPorts): Enumerator<RawUsbDevice> {
  return async () => {
    const ports = await listPorts();
    const devices: RawUsbDevice[] = [];
    for (const port of ports) {
      const vendorId = parseHexId(port.vendorId);
      // Ports without USB metadata (built-in UARTs, Bluetooth) are not USB devices
      if (vendorId === undefined) continue;
      devices.push({
        path: port.path,
        vendorId,
        productId: parseHexId(port.productId),
        serial: port.serialNumber || undefined,
      });
    }
    return devices;
  };
}
