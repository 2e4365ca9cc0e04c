/**
 * Device Record base class
 *
 * A record describes one physical device of one type. Its identity
 * (uniqueIdentifier) is stable across reconnects; its addresses are not.
 */

import type { DeviceIdentity, DeviceJSON, DeviceJSONBase, DeviceType, FilterValue } from "./types";

export interface DeviceInit {
  address?: string;
  addressAliases?: Iterable<string>;
}

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

export abstract class DeviceRecord {
  abstract readonly type: DeviceType;

  private _address: string | undefined;
  private _addressAliases: string[] = [];
  private _previousAddresses: string[] = [];

  constructor(init: DeviceInit = {}) {
    this._address = init.address;
    this.addressAliases = init.addressAliases ?? [];
  }

  /**
   * Fields that identify the physical device. Never includes the address.
   */
  abstract get uniqueIdentifier(): DeviceIdentity;

  abstract toJSON(): DeviceJSON;

  /**
   * Copy the type-specific fields of a freshly scanned record of the same type
   */
  protected abstract copyFieldsFrom(other: DeviceRecord): void;

  /**
   * Main address of the device
   */
  get address(): string | undefined {
    return this._address;
  }

  set address(address: string | undefined) {
    this._address = address;
    if (address !== undefined) {
      this._addressAliases = this._addressAliases.filter((alias) => alias !== address);
    }
  }

  /**
   * Secondary addresses. Duplicates and the main address are dropped on assignment.
   */
  get addressAliases(): readonly string[] {
    return [...this._addressAliases];
  }

  set addressAliases(aliases: Iterable<string>) {
    this._addressAliases = unique(aliases).filter((alias) => alias !== this._address);
  }

  get allAddresses(): readonly string[] {
    return this._address === undefined
      ? [...this._addressAliases]
      : [this._address, ...this._addressAliases];
  }

  /**
   * Addresses held before the last reset; probe targets when searching again
   */
  get previousAddresses(): readonly string[] {
    return [...this._previousAddresses];
  }

  isSameDevice(other: DeviceRecord): boolean {
    if (other.type !== this.type) return false;
    return identitiesEqual(this.uniqueIdentifier, other.uniqueIdentifier);
  }

  /**
   * Move address and aliases to previousAddresses
   */
  resetAddresses(): void {
    this._previousAddresses = unique([...this._previousAddresses, ...this.allAddresses]);
    this._address = undefined;
    this._addressAliases = [];
  }

  /**
   * Take over the addresses and known fields of a freshly scanned record
   * @throws TypeError if the other record has a different type
   */
  updateFrom(other: DeviceRecord): void {
    if (other === this) return;
    if (other.type !== this.type) {
      throw new TypeError(`Cannot update a ${this.type} device from a ${other.type} device`);
    }

    this.resetAddresses();
    this._address = other.address;
    this.addressAliases = other.addressAliases;

    const current = this.allAddresses;
    this._previousAddresses = unique([
      ...this._previousAddresses,
      ...other._previousAddresses,
    ]).filter((address) => !current.includes(address));

    this.copyFieldsFrom(other);
  }

  /**
   * Load serialized addresses. Stale addresses go straight to previousAddresses.
   */
  protected assignAddresses(json: DeviceJSONBase, stale: boolean): void {
    this._address = json.address;
    this.addressAliases = json.address_aliases ?? [];
    if (stale) this.resetAddresses();
  }

  protected addressesJSON(): Omit<DeviceJSONBase, "type"> {
    const json: Omit<DeviceJSONBase, "type"> = {};
    if (this._address !== undefined) json.address = this._address;
    if (this._addressAliases.length > 0) json.address_aliases = [...this._addressAliases];
    return json;
  }

  toString(): string {
    return `${this.constructor.name}(${this._address ?? "<no address>"})`;
  }
}

export function identitiesEqual(a: DeviceIdentity, b: DeviceIdentity): boolean {
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const key of keys) {
    const left: FilterValue = a[key] ?? null;
    const right: FilterValue = b[key] ?? null;
    if (left !== right) return false;
  }
  return true;
}
