/**
 * USB Device Scanner
 */

import { UsbDevice, USB_FIELDS } from "../device/usb";
import { DeviceType } from "../device/types";
import { CachingScanner } from "./base";
import type { Enumerator, RawUsbDevice } from "./interface";

export function usbDeviceFromRaw(raw: RawUsbDevice): UsbDevice {
  return new UsbDevice({
    address: raw.path,
    addressAliases: raw.devName ? [raw.devName] : [],
    vendorId: raw.vendorId,
    productId: raw.productId,
    revisionId: raw.revisionId,
    serial: raw.serial,
  });
}

export function createUsbScanner(
  enumerate: Enumerator<RawUsbDevice>
): CachingScanner<UsbDevice, RawUsbDevice> {
  return new CachingScanner({
    type: DeviceType.USB,
    enumerate,
    convert: usbDeviceFromRaw,
    fields: USB_FIELDS,
  });
}

/**
 * Parse a hex id as reported by sysfs or serialport ("413c", "0x413C")
 */
export function parseHexId(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim().replace(/^0x/i, "");
  if (!/^[0-9a-fA-F]+$/.test(trimmed)) return undefined;
  return parseInt(trimmed, 16);
}
