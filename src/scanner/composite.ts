/**
 * Composite Scanner
 * Routes calls to one scanner per registered device type. Owns no cache.
 * SOLID: Open/Closed - a new device type only needs a new sub-scanner
 */

import type { DeviceRecord } from "../device/device";
import { registeredTypes, resolveDeviceType, type DeviceTypeKey } from "../device/registry";
import { DeviceTypeMap } from "../device/type-map";
import type { DeviceFilter, DeviceType, ScanOptions } from "../device/types";
import { InvalidFilterError, ScanUnavailableError } from "../errors";
import { log } from "../log";
import type { DeviceScanner, TypedDeviceScanner } from "./interface";

export class CompositeScanner implements DeviceScanner {
  private readonly scanners = new DeviceTypeMap<TypedDeviceScanner>();

  constructor(scanners: Iterable<TypedDeviceScanner>) {
    const byType = new Map<DeviceType, TypedDeviceScanner>();
    for (const scanner of scanners) {
      byType.set(resolveDeviceType(scanner.type), scanner);
    }
    // Keep registration order regardless of the order given
    for (const type of registeredTypes()) {
      const scanner = byType.get(type);
      if (scanner) this.scanners.set(type, scanner);
    }
  }

  /**
   * Without a key: the composite itself. With a key: that type's scanner.
   * @throws UnknownTypeError for keys that do not name a registered type
   */
  get(): this;
  get(key: DeviceTypeKey): TypedDeviceScanner;
  get(key?: DeviceTypeKey): this | TypedDeviceScanner {
    if (key === undefined) return this;
    const scanner = this.scanners.get(key);
    if (!scanner) {
      throw new ScanUnavailableError(resolveDeviceType(key), "no scanner configured");
    }
    return scanner;
  }

  has(key: DeviceTypeKey): boolean {
    return this.scanners.has(key);
  }

  types(): DeviceType[] {
    return this.scanners.keys();
  }

  async listDevices(options: ScanOptions = {}): Promise<readonly DeviceRecord[]> {
    const devices: DeviceRecord[] = [];
    for (const scanner of this.scanners.values()) {
      devices.push(...(await scanner.listDevices(options)));
    }
    return devices;
  }

  /**
   * Search every sub-scanner. A filter that names a field unknown to one
   * type only excludes that type from the result.
   */
  async findDevices(filters: DeviceFilter, options: ScanOptions = {}): Promise<readonly DeviceRecord[]> {
    const devices: DeviceRecord[] = [];
    for (const scanner of this.scanners.values()) {
      try {
        devices.push(...(await scanner.findDevices(filters, options)));
      } catch (err) {
        if (!(err instanceof InvalidFilterError)) throw err;
        log.debug(`${scanner.type}: ${err.message}`);
      }
    }
    return devices;
  }

  /**
   * Probe hosts on every sub-scanner able to
   * @returns true if at least one sub-scanner probed
   */
  async probe(hosts: readonly string[]): Promise<boolean> {
    let probed = false;
    for (const scanner of this.scanners.values()) {
      if (scanner.probe && (await scanner.probe(hosts))) {
        probed = true;
      }
    }
    return probed;
  }
}
