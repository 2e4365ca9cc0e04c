/**
 * Device Type Registry
 *
 * Single place where a "type key" is turned into a DeviceType. Every API that
 * accepts a device type goes through resolveDeviceType().
 */

import { z } from "zod";
import { DeviceRecord } from "./device";
import { UsbDevice, USB_FIELDS } from "./usb";
import { LanDevice, LAN_FIELDS } from "./lan";
import type { FieldAccessors } from "./fields";
import { DeviceType, type DeviceIdentity } from "./types";
import { InvalidMacAddressError, InventoryFormatError, UnknownTypeError } from "../errors";

export type DeviceClass = abstract new (...args: never[]) => DeviceRecord;

/**
 * Accepted forms of a device type: the tag ("usb"), its name in any case ("USB"),
 * the record class (UsbDevice) or a record instance
 */
export type DeviceTypeKey = DeviceType | string | DeviceClass | DeviceRecord;

export interface DeviceTypeInfo<D extends DeviceRecord = DeviceRecord> {
  readonly type: DeviceType;
  readonly name: string;
  readonly recordClass: new () => D;
  readonly fields: FieldAccessors<D>;
  fromJSON(value: unknown, stale: boolean): D;
}

const usbInfo: DeviceTypeInfo<UsbDevice> = {
  type: DeviceType.USB,
  name: "USB",
  recordClass: UsbDevice,
  fields: USB_FIELDS,
  fromJSON: (value, stale) => UsbDevice.fromJSON(value, stale),
};

const lanInfo: DeviceTypeInfo<LanDevice> = {
  type: DeviceType.LAN,
  name: "LAN",
  recordClass: LanDevice,
  fields: LAN_FIELDS,
  fromJSON: (value, stale) => LanDevice.fromJSON(value, stale),
};

// Registration order is the order composite scans run in
const REGISTRY: ReadonlyMap<DeviceType, DeviceTypeInfo> = new Map<DeviceType, DeviceTypeInfo>([
  [usbInfo.type, usbInfo],
  [lanInfo.type, lanInfo],
]);

export function resolveDeviceType(key: DeviceTypeKey): DeviceType {
  if (typeof key === "string") {
    const wanted = key.toLowerCase();
    for (const info of REGISTRY.values()) {
      if (info.type === wanted || info.name.toLowerCase() === wanted) {
        return info.type;
      }
    }
  } else if (key instanceof DeviceRecord) {
    if (REGISTRY.has(key.type)) return key.type;
  } else if (typeof key === "function") {
    for (const info of REGISTRY.values()) {
      if (info.recordClass === key) return info.type;
    }
  }
  throw new UnknownTypeError(key);
}

export function deviceTypeInfo(key: DeviceTypeKey): DeviceTypeInfo {
  const info = REGISTRY.get(resolveDeviceType(key));
  if (!info) throw new UnknownTypeError(key);
  return info;
}

export function registeredTypes(): DeviceType[] {
  return [...REGISTRY.keys()];
}

export function createDevice(key: DeviceTypeKey): DeviceRecord {
  return new (deviceTypeInfo(key).recordClass)();
}

export function identityOf(device: DeviceRecord): DeviceIdentity {
  return device.uniqueIdentifier;
}

export function filterFields(key: DeviceTypeKey): string[] {
  return Object.keys(deviceTypeInfo(key).fields);
}

const deviceHeaderSchema = z.object({ type: z.string().optional() }).passthrough();

/**
 * Build a record from its serialized form, selecting the record class by the
 * "type" field (or fallbackType when the field is missing)
 * @param stale - move the serialized addresses to previousAddresses
 */
export function deviceFromJSON(
  value: unknown,
  fallbackType?: string,
  stale = false
): DeviceRecord {
  const header = deviceHeaderSchema.safeParse(value);
  if (!header.success) {
    throw new InventoryFormatError("A device entry must be a JSON object");
  }

  const declared = header.data.type;
  const typeKey = declared ?? fallbackType;
  if (typeKey === undefined) {
    throw new InventoryFormatError('A device entry needs a "type" field');
  }

  const type = resolveDeviceType(typeKey);
  if (fallbackType !== undefined && resolveDeviceType(fallbackType) !== type) {
    throw new InventoryFormatError(
      `Device entry stored under "${fallbackType}" declares type "${typeKey}"`
    );
  }

  const info = deviceTypeInfo(type);
  try {
    return info.fromJSON({ ...header.data, type }, stale);
  } catch (err) {
    if (err instanceof z.ZodError) {
      const issue = err.issues[0];
      const where = issue ? issue.path.join(".") : "";
      throw new InventoryFormatError(
        `Invalid ${type} device entry${where ? ` at "${where}"` : ""}: ${issue?.message ?? err.message}`,
        { cause: err }
      );
    }
    if (err instanceof InvalidMacAddressError) {
      throw new InventoryFormatError(`Invalid ${type} device entry: ${err.message}`, { cause: err });
    }
    throw err;
  }
}
