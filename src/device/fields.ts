/**
 * Filterable fields per device type
 * Explicit accessor table instead of looking attributes up by name at run time.
 */

import type { DeviceRecord } from "./device";
import type { FilterValue } from "./types";

export interface FieldAccessor<D> {
  matches(device: D, expected: FilterValue): boolean;
  normalize?(value: FilterValue): FilterValue;
}

export type FieldAccessors<D> = Readonly<Record<string, FieldAccessor<D>>>;

/**
 * Exact equality on a single value; null matches an absent field
 */
export function valueField<D>(
  read: (device: D) => string | number | undefined,
  normalize?: (value: FilterValue) => FilterValue
): FieldAccessor<D> {
  return {
    matches: (device, expected) => (read(device) ?? null) === expected,
    normalize,
  };
}

/**
 * Matches when the value is any of the device's addresses (aliases included)
 */
export function addressField<D extends DeviceRecord>(): FieldAccessor<D> {
  return {
    matches: (device, expected) =>
      expected === null
        ? device.allAddresses.length === 0
        : typeof expected === "string" && device.allAddresses.includes(expected),
  };
}
