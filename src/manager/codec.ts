/**
 * Inventory codec
 * JSON document: name -> type name -> serialized record
 */

import { z } from "zod";
import type { DeviceRecord } from "../device/device";
import { deviceFromJSON } from "../device/registry";
import type { DeviceJSON } from "../device/types";
import { InventoryFormatError } from "../errors";
import type { DeviceStore } from "./store";

export type InventoryDocument = Record<string, Partial<Record<string, DeviceJSON>>>;

const inventorySchema = z.record(z.string(), z.record(z.string(), z.unknown()));

// zod's record parser leaves out "__proto__" keys; entries are read from
// the checked value itself so any device name survives.
function isInventoryDocument(value: unknown): value is Record<string, Record<string, unknown>> {
  return inventorySchema.safeParse(value).success;
}

export function encodeInventory(store: DeviceStore, pretty = false): string {
  // Names are user input ("constructor", "__proto__"), never plain object keys
  const document = new Map<string, Partial<Record<string, DeviceJSON>>>();
  for (const [name, type, device] of store.entries()) {
    const types = document.get(name) ?? {};
    types[type] = device.toJSON();
    document.set(name, types);
  }
  const data: InventoryDocument = Object.fromEntries(document);
  return JSON.stringify(data, null, pretty ? 4 : undefined);
}

/**
 * Parse an inventory document. Records come back stale: their stored
 * addresses are in previousAddresses until refreshed by a scan.
 * @throws InventoryFormatError if the text is not an inventory document
 */
export function decodeInventory(text: string): [string, DeviceRecord][] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InventoryFormatError(`Inventory is not valid JSON: ${reason}`, { cause: err });
  }

  if (!isInventoryDocument(parsed)) {
    const error = inventorySchema.safeParse(parsed).error;
    throw new InventoryFormatError(
      "Inventory must be an object of names, each mapping type names to devices",
      { cause: error }
    );
  }

  const items: [string, DeviceRecord][] = [];
  for (const [name, types] of Object.entries(parsed)) {
    for (const [typeName, value] of Object.entries(types)) {
      items.push([name, deviceFromJSON(value, typeName, true)]);
    }
  }
  return items;
}
