/**
 * Device Store
 *
 * Records stored under user-chosen names; one name may hold one record per
 * device type. Internally a flat (name, type) -> record table. Reading a
 * name returns the bare record when it holds one type, a type map otherwise.
 */

import type { DeviceRecord } from "../device/device";
import { resolveDeviceType, type DeviceTypeKey } from "../device/registry";
import { DeviceTypeMap } from "../device/type-map";
import type { DeviceType } from "../device/types";
import { DeviceKeyError } from "../errors";

/**
 * What a name resolves to: one record, or one record per stored type
 */
export type StoredDevice = DeviceRecord | DeviceTypeMap<DeviceRecord>;

interface StoreEntry {
  name: string;
  type: DeviceType;
  device: DeviceRecord;
}

function pairKey(name: string, type: DeviceType): string {
  return JSON.stringify([name, type]);
}

export class DeviceStore implements Iterable<string> {
  private readonly table = new Map<string, StoreEntry>();

  /**
   * Number of names (a name holding several types counts once)
   */
  get size(): number {
    return this.keys().length;
  }

  /**
   * Store a record under name, replacing any record of the same type there
   */
  set(name: string, device: DeviceRecord): this {
    const type = resolveDeviceType(device);
    this.table.set(pairKey(name, type), { name, type, device });
    return this;
  }

  /**
   * @throws DeviceKeyError if nothing is stored under the name (or name and type)
   */
  get(name: string): StoredDevice;
  get(name: string, typeKey: DeviceTypeKey): DeviceRecord;
  get(name: string, typeKey?: DeviceTypeKey): StoredDevice {
    if (typeKey !== undefined) {
      const type = resolveDeviceType(typeKey);
      const entry = this.table.get(pairKey(name, type));
      if (!entry) throw new DeviceKeyError(name, type);
      return entry.device;
    }

    const devices = this.getAll(name);
    if (devices.size === 1) {
      return devices.values()[0];
    }
    return devices;
  }

  /**
   * Every record under name as a type map, even when there is only one
   * @throws DeviceKeyError if nothing is stored under the name
   */
  getAll(name: string): DeviceTypeMap<DeviceRecord> {
    const devices = new DeviceTypeMap<DeviceRecord>();
    for (const entry of this.table.values()) {
      if (entry.name === name) devices.set(entry.type, entry.device);
    }
    if (devices.size === 0) throw new DeviceKeyError(name);
    return devices;
  }

  /**
   * Remove one (name, type) pair, or every type under name
   * @throws DeviceKeyError if nothing matched
   */
  remove(name: string, typeKey?: DeviceTypeKey): void {
    if (typeKey !== undefined) {
      const type = resolveDeviceType(typeKey);
      if (!this.table.delete(pairKey(name, type))) {
        throw new DeviceKeyError(name, type);
      }
      return;
    }

    let removed = false;
    for (const [key, entry] of this.table) {
      if (entry.name === name) {
        this.table.delete(key);
        removed = true;
      }
    }
    if (!removed) throw new DeviceKeyError(name);
  }

  has(name: string, typeKey?: DeviceTypeKey): boolean {
    if (typeKey !== undefined) {
      return this.table.has(pairKey(name, resolveDeviceType(typeKey)));
    }
    for (const entry of this.table.values()) {
      if (entry.name === name) return true;
    }
    return false;
  }

  /**
   * Stored names, in the order they were first stored
   */
  keys(): string[] {
    const names = new Set<string>();
    for (const entry of this.table.values()) {
      names.add(entry.name);
    }
    return [...names];
  }

  values(): StoredDevice[] {
    return this.keys().map((name) => this.get(name));
  }

  items(): [string, StoredDevice][] {
    return this.keys().map((name) => [name, this.get(name)]);
  }

  /**
   * Every stored (name, type, record) triple
   */
  entries(): [string, DeviceType, DeviceRecord][] {
    return [...this.table.values()].map(({ name, type, device }) => [name, type, device]);
  }

  clear(): void {
    this.table.clear();
  }

  *[Symbol.iterator](): Generator<string> {
    yield* this.keys();
  }
}
