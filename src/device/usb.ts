/**
 * USB device record
 * Identified by vendor id, product id and serial number.
 */

import { z } from "zod";
import { DeviceRecord, type DeviceInit } from "./device";
import { addressField, valueField, type FieldAccessors } from "./fields";
import { usbIdDatabase } from "./usb-ids";
import { DeviceType, type DeviceIdentity, type UsbDeviceJSON } from "./types";

export interface UsbDeviceInit extends DeviceInit {
  vendorId?: number;
  productId?: number;
  revisionId?: number;
  serial?: string;
}

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const optionalInt = z
  .number()
  .int()
  .nonnegative()
  .nullish()
  .transform((value) => value ?? undefined);

export const usbDeviceSchema = z.object({
  type: z.literal(DeviceType.USB),
  address: optionalString,
  address_aliases: z.array(z.string()).nullish(),
  vendor_id: optionalInt,
  product_id: optionalInt,
  revision_id: optionalInt,
  serial: optionalString,
});

export class UsbDevice extends DeviceRecord {
  static readonly deviceType = DeviceType.USB;

  readonly type = DeviceType.USB;

  /** Manufacturer id, assigned by the USB committee */
  vendorId?: number;
  /** Product id, assigned by the manufacturer */
  productId?: number;
  revisionId?: number;
  serial?: string;

  constructor(init: UsbDeviceInit = {}) {
    super(init);
    this.vendorId = init.vendorId;
    this.productId = init.productId;
    this.revisionId = init.revisionId;
    this.serial = init.serial;
  }

  static fromJSON(value: unknown, stale = false): UsbDevice {
    const json = usbDeviceSchema.parse(value);
    const device = new UsbDevice({
      vendorId: json.vendor_id,
      productId: json.product_id,
      revisionId: json.revision_id,
      serial: json.serial,
    });
    device.assignAddresses(
      { type: json.type, address: json.address, address_aliases: json.address_aliases ?? undefined },
      stale
    );
    return device;
  }

  get uniqueIdentifier(): DeviceIdentity {
    return {
      vendorId: this.vendorId ?? null,
      productId: this.productId ?? null,
      serial: this.serial ?? null,
    };
  }

  get vendorName(): string | undefined {
    return usbIdDatabase().vendorName(this.vendorId);
  }

  get productName(): string | undefined {
    return usbIdDatabase().productName(this.vendorId, this.productId);
  }

  toJSON(): UsbDeviceJSON {
    const json: UsbDeviceJSON = { type: this.type, ...this.addressesJSON() };
    if (this.vendorId !== undefined) json.vendor_id = this.vendorId;
    if (this.productId !== undefined) json.product_id = this.productId;
    if (this.revisionId !== undefined) json.revision_id = this.revisionId;
    if (this.serial !== undefined) json.serial = this.serial;
    return json;
  }

  protected copyFieldsFrom(other: DeviceRecord): void {
    if (!(other instanceof UsbDevice)) return;
    if (other.vendorId !== undefined) this.vendorId = other.vendorId;
    if (other.productId !== undefined) this.productId = other.productId;
    if (other.revisionId !== undefined) this.revisionId = other.revisionId;
    if (other.serial !== undefined) this.serial = other.serial;
  }
}

export const USB_FIELDS: FieldAccessors<UsbDevice> = {
  address: addressField<UsbDevice>(),
  vendorId: valueField<UsbDevice>((d) => d.vendorId),
  productId: valueField<UsbDevice>((d) => d.productId),
  revisionId: valueField<UsbDevice>((d) => d.revisionId),
  serial: valueField<UsbDevice>((d) => d.serial),
  vendorName: valueField<UsbDevice>((d) => d.vendorName),
  productName: valueField<UsbDevice>((d) => d.productName),
};
