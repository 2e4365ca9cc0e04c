/**
 * Device Type Definitions
 */

// Supported device types
export const DeviceType = {
  USB: "usb",
  LAN: "lan",
} as const;

export type DeviceType = (typeof DeviceType)[keyof typeof DeviceType];

// Value a filter compares against; null matches an absent field
export type FilterValue = string | number | null;

// Field name -> expected value. Keys holding undefined are ignored.
export type DeviceFilter = Readonly<Record<string, FilterValue | undefined>>;

// Type-specific identity fields, stable across reconnects
export type DeviceIdentity = Readonly<Record<string, FilterValue>>;

export interface ScanOptions {
  /** Call the enumerator even if a cached result exists */
  rescan?: boolean;
}

/**
 * Serialized form shared by all device types
 */
export interface DeviceJSONBase {
  type: DeviceType;
  address?: string;
  address_aliases?: string[];
}

export interface UsbDeviceJSON extends DeviceJSONBase {
  type: "usb";
  vendor_id?: number;
  product_id?: number;
  revision_id?: number;
  serial?: string;
}

export interface LanDeviceJSON extends DeviceJSONBase {
  type: "lan";
  mac_address?: string;
}

export type DeviceJSON = UsbDeviceJSON | LanDeviceJSON;
