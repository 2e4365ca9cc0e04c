/**
 * LAN (Ethernet) device record
 * Identified by its mac address alone.
 */

import { z } from "zod";
import { DeviceRecord, type DeviceInit } from "./device";
import { addressField, valueField, type FieldAccessors } from "./fields";
import { InvalidMacAddressError } from "../errors";
import { DeviceType, type DeviceIdentity, type FilterValue, type LanDeviceJSON } from "./types";

const MAC_PATTERN = /^([0-9A-Fa-f]{2}[.:-]){5}([0-9A-Fa-f]{2})$/;

/**
 * Normalize a mac address to upper case with colon separators
 * Accepts ":", "-" or "." as separators, e.g. "01-23-45-67-89-ab" -> "01:23:45:67:89:AB"
 * @throws InvalidMacAddressError if the value is not a mac address
 */
export function formatMac(macAddress: string): string {
  if (!MAC_PATTERN.test(macAddress)) {
    throw new InvalidMacAddressError(macAddress);
  }
  return macAddress.replace(/[.-]/g, ":").toUpperCase();
}

export interface LanDeviceInit extends DeviceInit {
  macAddress?: string;
}

export const lanDeviceSchema = z.object({
  type: z.literal(DeviceType.LAN),
  address: z
    .string()
    .nullish()
    .transform((value) => value ?? undefined),
  address_aliases: z.array(z.string()).nullish(),
  mac_address: z
    .string()
    .nullish()
    .transform((value) => value ?? undefined),
});

export class LanDevice extends DeviceRecord {
  static readonly deviceType = DeviceType.LAN;

  readonly type = DeviceType.LAN;

  private _macAddress: string | undefined;

  constructor(init: LanDeviceInit = {}) {
    super(init);
    this.macAddress = init.macAddress;
  }

  static fromJSON(value: unknown, stale = false): LanDevice {
    const json = lanDeviceSchema.parse(value);
    const device = new LanDevice({ macAddress: json.mac_address });
    device.assignAddresses(
      { type: json.type, address: json.address, address_aliases: json.address_aliases ?? undefined },
      stale
    );
    return device;
  }

  /**
   * Physical address, normalized on every assignment
   */
  get macAddress(): string | undefined {
    return this._macAddress;
  }

  set macAddress(macAddress: string | undefined) {
    this._macAddress = macAddress === undefined ? undefined : formatMac(macAddress);
  }

  get uniqueIdentifier(): DeviceIdentity {
    return { macAddress: this._macAddress ?? null };
  }

  toJSON(): LanDeviceJSON {
    const json: LanDeviceJSON = { type: this.type, ...this.addressesJSON() };
    if (this._macAddress !== undefined) json.mac_address = this._macAddress;
    return json;
  }

  protected copyFieldsFrom(other: DeviceRecord): void {
    if (!(other instanceof LanDevice)) return;
    if (other.macAddress !== undefined) this.macAddress = other.macAddress;
  }
}

function normalizeMacFilter(value: FilterValue): FilterValue {
  return typeof value === "string" ? formatMac(value) : value;
}

export const LAN_FIELDS: FieldAccessors<LanDevice> = {
  address: addressField<LanDevice>(),
  macAddress: valueField<LanDevice>((d) => d.macAddress, normalizeMacFilter),
};
