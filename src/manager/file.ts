/**
 * Inventory files
 */

import { createReadStream, createWriteStream } from "fs";
import { finished } from "stream/promises";
import { log } from "../log";
import type { CompositeScanner } from "../scanner/composite";
import { createScanner } from "../scanner/platform";
import { DeviceManager } from "./manager";

export interface InventoryFileOptions {
  /** Defaults to the scanner for this host */
  scanner?: CompositeScanner;
  /** Start empty when the file does not exist */
  create?: boolean;
  pretty?: boolean;
}

export interface WithInventoryOptions extends InventoryFileOptions {
  /** Save back to the file when fn succeeds */
  autosave?: boolean;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function openInventory(
  filename: string,
  options: InventoryFileOptions = {}
): Promise<DeviceManager> {
  const manager = new DeviceManager(options.scanner ?? createScanner());
  try {
    await manager.load(createReadStream(filename, "utf-8"));
  } catch (err) {
    if (!(options.create && isMissingFile(err))) throw err;
    log.debug(`${filename} does not exist, starting with an empty inventory`);
  }
  return manager;
}

export async function saveInventory(
  manager: DeviceManager,
  filename: string,
  options: { pretty?: boolean } = {}
): Promise<void> {
  const stream = createWriteStream(filename, "utf-8");
  await manager.save(stream, options);
  stream.end();
  await finished(stream);
}

/**
 * Load an inventory, run fn with it, and save it back if autosave is set
 * and fn did not throw
 */
export async function withInventory<T>(
  filename: string,
  fn: (manager: DeviceManager) => T | Promise<T>,
  options: WithInventoryOptions = {}
): Promise<T> {
  const manager = await openInventory(filename, options);
  const result = await fn(manager);
  if (options.autosave) {
    await saveInventory(manager, filename, { pretty: options.pretty });
  }
  return result;
}
