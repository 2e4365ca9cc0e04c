/**
 * USB ID database
 * Maps vendor/product ids to names using the usb.ids file format.
 */

import { existsSync, readFileSync } from "fs";
import { config } from "../config";
import { log } from "../log";

const DEFAULT_PATHS = [
  "/usr/share/hwdata/usb.ids",
  "/usr/share/misc/usb.ids",
  "/usr/share/usb.ids",
  "/var/lib/usbutils/usb.ids",
];

interface VendorEntry {
  name: string;
  products: Map<number, string>;
}

export class UsbIdDatabase {
  private readonly vendors: Map<number, VendorEntry>;

  constructor(vendors: Map<number, VendorEntry> = new Map()) {
    this.vendors = vendors;
  }

  static empty(): UsbIdDatabase {
    return new UsbIdDatabase();
  }

  /**
   * Parse usb.ids text. Stops at the first section header (e.g. "C 00  ...").
   */
  static parse(text: string): UsbIdDatabase {
    const vendors = new Map<number, VendorEntry>();
    let current: VendorEntry | null = null;

    for (const line of text.split(/\r?\n/)) {
      if (line.startsWith("#") || line.trim() === "") continue;
      if (/^[A-Z]/.test(line)) break;

      const vendor = line.match(/^([0-9a-fA-F]{4})\s+(.+)$/);
      if (vendor) {
        current = { name: vendor[2].trim(), products: new Map() };
        vendors.set(parseInt(vendor[1], 16), current);
        continue;
      }

      // Interface lines (two tabs) are not needed
      const product = line.match(/^\t([0-9a-fA-F]{4})\s+(.+)$/);
      if (product && current) {
        current.products.set(parseInt(product[1], 16), product[2].trim());
      }
    }

    return new UsbIdDatabase(vendors);
  }

  static load(path: string): UsbIdDatabase {
    return UsbIdDatabase.parse(readFileSync(path, "latin1"));
  }

  get size(): number {
    return this.vendors.size;
  }

  vendorName(vendorId: number | undefined): string | undefined {
    if (vendorId === undefined) return undefined;
    return this.vendors.get(vendorId)?.name;
  }

  productName(vendorId: number | undefined, productId: number | undefined): string | undefined {
    if (vendorId === undefined || productId === undefined) return undefined;
    return this.vendors.get(vendorId)?.products.get(productId);
  }
}

let database: UsbIdDatabase | null = null;

function loadDefaultDatabase(): UsbIdDatabase {
  const candidates = config.USB_IDS_PATH ? [config.USB_IDS_PATH] : DEFAULT_PATHS;
  for (const path of candidates) {
    if (!existsSync(path)) continue;
    try {
      const db = UsbIdDatabase.load(path);
      log.debug(`Loaded ${db.size} USB vendors from ${path}`);
      return db;
    } catch (err) {
      log.warn(`Could not read ${path}:`, err instanceof Error ? err.message : err);
    }
  }
  log.debug("No usb.ids database found, vendor and product names unavailable");
  return UsbIdDatabase.empty();
}

/**
 * Process-wide database, loaded on first use
 */
export function usbIdDatabase(): UsbIdDatabase {
  if (!database) {
    database = loadDefaultDatabase();
  }
  return database;
}

export function useUsbIdDatabase(db: UsbIdDatabase | null): void {
  database = db;
}
