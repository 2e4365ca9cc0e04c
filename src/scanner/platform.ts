/**
 * Platform selection
 * Picks the enumerators for the host once. Nothing below this module
 * branches on the platform.
 */

import { config } from "../config";
import { UnsupportedPlatformError } from "../errors";
import { CompositeScanner } from "./composite";
import type { CommandRunner } from "./exec";
import type { Enumerator, RawLanDevice, RawUsbDevice } from "./interface";
import { LanScanner, neighborTableEnumerator, type NeighborCommand } from "./lan";
import { NmapProbe } from "./nmap";
import { createUsbScanner } from "./usb";
import { serialPortEnumerator, type ListPortsFn } from "./usb-serialport";
import { sysfsUsbEnumerator } from "./usb-sysfs";

export interface ScannerOptions {
  /** Defaults to process.platform */
  platform?: string;
  /** Runs ip, arp and nmap */
  run?: CommandRunner;
  sysfsRoot?: string;
  listPorts?: ListPortsFn;
  /** null disables probing; default depends on NMAP_ENABLED */
  nmap?: NmapProbe | null;
}

export interface PlatformEnumerators {
  usb: Enumerator<RawUsbDevice>;
  lan: Enumerator<RawLanDevice>;
}

const LINUX_NEIGHBOR_COMMANDS: readonly NeighborCommand[] = [
  ["ip", ["neigh", "show"]],
  ["arp", ["-n"]],
];

const ARP_COMMANDS: readonly NeighborCommand[] = [["arp", ["-a"]]];

/**
 * @throws UnsupportedPlatformError if the host has no enumerators
 */
export function platformEnumerators(options: ScannerOptions = {}): PlatformEnumerators {
  const platform = options.platform ?? process.platform;

  switch (platform) {
    case "linux":
      return {
        usb: sysfsUsbEnumerator(options.sysfsRoot ?? config.SYSFS_USB_ROOT),
        lan: neighborTableEnumerator({ commands: LINUX_NEIGHBOR_COMMANDS, run: options.run }),
      };
    case "darwin":
    case "win32":
      return {
        usb: serialPortEnumerator(options.listPorts),
        lan: neighborTableEnumerator({ commands: ARP_COMMANDS, run: options.run }),
      };
    default:
      throw new UnsupportedPlatformError(platform);
  }
}

/**
 * Create the composite scanner for this host
 */
export function createScanner(options: ScannerOptions = {}): CompositeScanner {
  const enumerators = platformEnumerators(options);
  const nmap =
    options.nmap !== undefined
      ? options.nmap
      : config.NMAP_ENABLED
        ? new NmapProbe({ run: options.run })
        : null;

  return new CompositeScanner([
    createUsbScanner(enumerators.usb),
    new LanScanner(enumerators.lan, nmap),
  ]);
}
