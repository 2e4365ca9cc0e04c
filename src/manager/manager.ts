/**
 * Device Manager
 *
 * A DeviceStore that can look devices up: by address when adding them, by
 * identity when their addresses need refreshing (after loading a saved
 * inventory, or when a device was reconnected elsewhere).
 *
 * Address lookup order: scan cache, rescan, probe (nmap) then cache again.
 */

import type { Readable, Writable } from "stream";
import { text } from "stream/consumers";
import { config } from "../config";
import type { DeviceRecord } from "../device/device";
import { createDevice, identityOf, resolveDeviceType, type DeviceTypeKey } from "../device/registry";
import { DeviceTypeMap } from "../device/type-map";
import type { DeviceFilter, ScanOptions } from "../device/types";
import { DeviceNotFoundError, ScanUnavailableError } from "../errors";
import { log } from "../log";
import type { CompositeScanner } from "../scanner/composite";
import type { DeviceScanner } from "../scanner/interface";
import { decodeInventory, encodeInventory } from "./codec";
import { DeviceStore, type StoredDevice } from "./store";

export interface SaveOptions {
  pretty?: boolean;
}

export interface LoadOptions {
  /** Remove stored devices first (default true) */
  clear?: boolean;
}

// Detached copy, so refreshing a stored record never touches a scan cache
function copyDevice(device: DeviceRecord): DeviceRecord {
  const copy = createDevice(device);
  copy.updateFrom(device);
  return copy;
}

export class DeviceManager extends DeviceStore {
  readonly scanner: CompositeScanner;

  constructor(scanner: CompositeScanner) {
    super();
    this.scanner = scanner;
  }

  /**
   * Find the device currently at an address
   * @param typeKey - search only this device type
   */
  async findByAddress(address: string, typeKey?: DeviceTypeKey): Promise<DeviceRecord | undefined> {
    const scanner: DeviceScanner =
      typeKey === undefined ? this.scanner : this.scanner.get(typeKey);
    const filter: DeviceFilter = { address };

    let devices = await scanner.findDevices(filter);
    if (devices.length === 0) {
      devices = await scanner.findDevices(filter, { rescan: true });
    }
    if (devices.length === 0 && (await this.probe(scanner, [address]))) {
      devices = await scanner.findDevices(filter);
    }

    if (devices.length > 1) {
      log.warn(`Expected one device at "${address}", found ${devices.length}`);
    }
    return devices.length > 0 ? devices[0] : undefined;
  }

  /**
   * Find the scanned device with the same identity as the given record
   */
  async findByDevice(
    device: DeviceRecord,
    { rescan = true }: ScanOptions = {}
  ): Promise<DeviceRecord | undefined> {
    const scanner = this.scanner.get(device);
    const filter: DeviceFilter = identityOf(device);

    let devices = await scanner.findDevices(filter, { rescan });
    if (devices.length === 0) {
      const hosts = [...device.allAddresses, ...device.previousAddresses];
      if (hosts.length > 0 && (await this.probe(scanner, hosts))) {
        devices = await scanner.findDevices(filter);
      }
    }

    if (devices.length > 1) {
      log.warn(`Expected one device matching ${device}, found ${devices.length}`);
    }
    return devices.length > 0 ? devices[0] : undefined;
  }

  /**
   * Store the device found at an address under name
   * @throws DeviceNotFoundError if no device is at the address
   */
  async setByAddress(name: string, address: string, typeKey?: DeviceTypeKey): Promise<DeviceRecord> {
    const found = await this.findByAddress(address, typeKey);
    if (!found) {
      throw new DeviceNotFoundError(
        address,
        typeKey === undefined ? undefined : resolveDeviceType(typeKey)
      );
    }
    const device = copyDevice(found);
    this.set(name, device);
    return device;
  }

  /**
   * Like get(), but first refreshes the addresses of the records returned.
   * Records that already have addresses are only looked up again with rescan.
   */
  async refresh(name: string): Promise<StoredDevice>;
  async refresh(name: string, typeKey: DeviceTypeKey, options?: ScanOptions): Promise<DeviceRecord>;
  async refresh(
    name: string,
    typeKey?: DeviceTypeKey,
    options: ScanOptions = {}
  ): Promise<StoredDevice> {
    const stored = typeKey === undefined ? this.get(name) : this.get(name, typeKey);
    const devices = stored instanceof DeviceTypeMap ? stored.values() : [stored];

    for (const device of devices) {
      if (device.allAddresses.length > 0 && !options.rescan) continue;
      await this.refreshDevice(device, { rescan: true });
    }
    return stored;
  }

  /**
   * Look up every stored record by identity. With rescan (default), each
   * stored device type is scanned once first.
   */
  async refreshAddresses({ rescan = true }: ScanOptions = {}): Promise<void> {
    const entries = this.entries();

    if (rescan) {
      const types = new Set(entries.map(([, type]) => type));
      for (const type of types) {
        await this.scanner.get(type).listDevices({ rescan: true });
      }
    }

    for (const [, , device] of entries) {
      await this.refreshDevice(device, { rescan: false });
    }
  }

  resetAddresses(): void {
    for (const [, , device] of this.entries()) {
      device.resetAddresses();
    }
  }

  async save(stream: Writable, { pretty = config.PRETTY_JSON }: SaveOptions = {}): Promise<void> {
    const data = encodeInventory(this, pretty);
    await new Promise<void>((resolve, reject) => {
      stream.write(data, (err) => (err ? reject(err) : resolve()));
    });
  }

  /**
   * Read an inventory and refresh the addresses of every loaded record
   * @returns the loaded (name, record) pairs
   */
  async load(stream: Readable, { clear = true }: LoadOptions = {}): Promise<[string, DeviceRecord][]> {
    const items = decodeInventory(await text(stream));

    if (clear) this.clear();
    for (const [name, device] of items) {
      this.set(name, device);
    }

    await this.refreshAddresses();
    log.debug(`Loaded ${items.length} device(s)`);
    return items;
  }

  /**
   * Take over the addresses of the scanned device, or clear them when the
   * device is not connected
   */
  private async refreshDevice(device: DeviceRecord, options: ScanOptions): Promise<boolean> {
    const found = await this.findByDevice(device, options);
    if (found) {
      device.updateFrom(found);
      return true;
    }
    device.resetAddresses();
    return false;
  }

  private async probe(scanner: DeviceScanner, hosts: readonly string[]): Promise<boolean> {
    if (!scanner.probe) return false;
    try {
      return await scanner.probe(hosts);
    } catch (err) {
      if (!(err instanceof ScanUnavailableError)) throw err;
      log.warn(`Probe failed: ${err.message}`);
      return false;
    }
  }
}
