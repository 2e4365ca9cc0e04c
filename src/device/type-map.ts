/**
 * Map keyed by device type
 * Every key form accepted by resolveDeviceType() addresses the same entry.
 */

import { resolveDeviceType, type DeviceTypeKey } from "./registry";
import type { DeviceType } from "./types";

export class DeviceTypeMap<V> implements Iterable<[DeviceType, V]> {
  private readonly map = new Map<DeviceType, V>();

  constructor(entries: Iterable<readonly [DeviceTypeKey, V]> = []) {
    for (const [key, value] of entries) {
      this.set(key, value);
    }
  }

  get size(): number {
    return this.map.size;
  }

  get(key: DeviceTypeKey): V | undefined {
    return this.map.get(resolveDeviceType(key));
  }

  set(key: DeviceTypeKey, value: V): this {
    this.map.set(resolveDeviceType(key), value);
    return this;
  }

  has(key: DeviceTypeKey): boolean {
    return this.map.has(resolveDeviceType(key));
  }

  delete(key: DeviceTypeKey): boolean {
    return this.map.delete(resolveDeviceType(key));
  }

  keys(): DeviceType[] {
    return [...this.map.keys()];
  }

  values(): V[] {
    return [...this.map.values()];
  }

  entries(): [DeviceType, V][] {
    return [...this.map.entries()];
  }

  *[Symbol.iterator](): Generator<[DeviceType, V]> {
    yield* this.map.entries();
  }
}
