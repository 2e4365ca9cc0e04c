/**
 * Device Scanner Interface
 * Scanners turn platform enumerator output into device records.
 * SOLID: Dependency Inversion - the store depends on this abstraction, not on platforms
 */

import type { DeviceRecord } from "../device/device";
import type { DeviceFilter, DeviceType, ScanOptions } from "../device/types";

/**
 * Platform enumerator: lists the raw descriptors currently attached.
 * May be called any number of times; rejects when the platform facility is unavailable.
 */
export type Enumerator<R> = () => Promise<R[]>;

export type ScanState = "unscanned" | "cached";

export interface DeviceScanner<D extends DeviceRecord = DeviceRecord> {
  /**
   * List all connected devices (cached unless rescan is set)
   */
  listDevices(options?: ScanOptions): Promise<readonly D[]>;

  /**
   * List connected devices matching every filter, in scan order
   */
  findDevices(filters: DeviceFilter, options?: ScanOptions): Promise<readonly D[]>;

  /**
   * Actively probe hosts so that later scans can see them
   * @returns false if this scanner has no way to probe
   */
  probe?(hosts: readonly string[]): Promise<boolean>;
}

export interface TypedDeviceScanner<D extends DeviceRecord = DeviceRecord> extends DeviceScanner<D> {
  readonly type: DeviceType;
}

// Raw USB descriptor as reported by the platform
export interface RawUsbDevice {
  path: string;
  devName?: string;
  vendorId?: number;
  productId?: number;
  revisionId?: number;
  serial?: string;
}

// Raw LAN neighbour: one mac address with every IP seen for it
export interface RawLanDevice {
  macAddress: string;
  addresses: string[];
}
