/**
 * Linux USB enumeration through sysfs
 * Every /sys/bus/usb/devices entry without ":" (interfaces have one) that
 * reports an idVendor is a device.
 */

import { readdir, readFile, realpath } from "fs/promises";
import { join } from "path";
import { config } from "../config";
import { DeviceType } from "../device/types";
import { ScanUnavailableError } from "../errors";
import type { Enumerator, RawUsbDevice } from "./interface";
import { parseHexId } from "./usb";

async function readAttribute(dir: string, name: string): Promise<string | undefined> {
  try {
    return (await readFile(join(dir, name), "utf-8")).trim();
  } catch {
    // Attribute not exposed by this device
    return undefined;
  }
}

async function resolveEntry(dir: string): Promise<string | undefined> {
  try {
    return await realpath(dir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined;
    throw err;
  }
}

function devNodePath(busnum: string | undefined, devnum: string | undefined): string | undefined {
  if (!busnum || !devnum) return undefined;
  const bus = parseInt(busnum, 10);
  const dev = parseInt(devnum, 10);
  if (isNaN(bus) || isNaN(dev)) return undefined;
  return `/dev/bus/usb/${String(bus).padStart(3, "0")}/${String(dev).padStart(3, "0")}`;
}

export function sysfsUsbEnumerator(root: string = config.SYSFS_USB_ROOT): Enumerator<RawUsbDevice> {
  return async () => {
    let entries: string[];
    try {
      entries = await readdir(root);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ScanUnavailableError(DeviceType.USB, `cannot read ${root}: ${reason}`, {
        cause: err,
      });
    }

    const devices: RawUsbDevice[] = [];
    for (const entry of entries.sort()) {
      if (entry.includes(":")) continue;

      const dir = join(root, entry);
      const real = await resolveEntry(dir);
      // Unplugged since readdir()
      if (real === undefined) continue;

      const vendorId = parseHexId(await readAttribute(dir, "idVendor"));
      if (vendorId === undefined) continue;

      // Device path as udev reports it: /devices/pci0000:00/.../1-2
      const path = real.startsWith("/sys/") ? real.slice("/sys".length) : real;

      const serial = await readAttribute(dir, "serial");
      devices.push({
        path,
        devName: devNodePath(await readAttribute(dir, "busnum"), await readAttribute(dir, "devnum")),
        vendorId,
        productId: parseHexId(await readAttribute(dir, "idProduct")),
        revisionId: parseHexId(await readAttribute(dir, "bcdDevice")),
        serial: serial || undefined,
      });
    }

    return devices;
  };
}
