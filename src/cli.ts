/**
 * Device Inventory CLI
 *
 * Usage: npx tsx src/main.ts [options]
 */

import { parseArgs } from "util";
import { config, printConfig } from "./config";
import type { DeviceRecord } from "./device/device";
import { resolveDeviceType } from "./device/registry";
import type { DeviceType } from "./device/types";
import { DeviceInventoryError } from "./errors";
import { setLogLevel } from "./log";
import { openInventory, withInventory } from "./manager/file";
import type { CompositeScanner } from "./scanner/composite";
import { createScanner } from "./scanner/platform";

export interface CliDeps {
  /** Defaults to the scanner for this host, created on first use */
  scanner?: CompositeScanner;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

const USAGE = `
Device Inventory

Usage:
  npx tsx src/main.ts [options]

Options:
  -l, --list               List connected devices
  -a, --add <name=addr>    Store the device at an address under a name
  -r, --remove <name>      Remove a stored device
  -s, --show               Show stored devices with their current addresses
  -t, --type <type>        Restrict to one device type (usb, lan)
      --rescan             Scan again instead of using cached results
  -f, --file <path>        Inventory file (default: ${config.INVENTORY_FILE})
      --pretty             Indent the saved inventory
  -v, --verbose            Debug logging
      --config             Print configuration
  -h, --help               Show this help

Environment Variables (overridden by CLI args):
  DEVINV_INVENTORY_FILE    Inventory file (default: devices.json)
  DEVINV_PRETTY_JSON       Indent saved inventories (default: false)
  DEVINV_LOG_LEVEL         Log level: debug, info, warn, error, silent (default: info)
  DEVINV_COMMAND_TIMEOUT   Timeout for ip/arp in ms (default: 5000)
  DEVINV_NMAP_ENABLED      Probe with nmap when an address is not found (default: true)
  DEVINV_NMAP_PATH         nmap executable (default: nmap)
  DEVINV_SYSFS_USB_ROOT    Linux USB device directory (default: /sys/bus/usb/devices)
  DEVINV_USB_IDS_PATH      usb.ids file (default: system location)

Examples:
  npx tsx src/main.ts -l -t usb
  npx tsx src/main.ts -a printer=192.168.1.23 -t lan
  npx tsx src/main.ts -s -f lab.json
`;

function formatValue(value: string | number): string {
  return typeof value === "number" ? `0x${value.toString(16).padStart(4, "0")}` : value;
}

/**
 * One line per device: "[usb] /devices/... vendorId=0x413c productId=0x2113 serial=..."
 */
export function describeDevice(device: DeviceRecord): string {
  const aliases = device.addressAliases.length > 0 ? ` (${device.addressAliases.join(", ")})` : "";
  const identity = Object.entries(device.uniqueIdentifier)
    .flatMap(([field, value]) => (value === null ? [] : [`${field}=${formatValue(value)}`]))
    .join(" ");
  return `[${device.type}] ${device.address ?? "<no address>"}${aliases}${identity ? ` ${identity}` : ""}`;
}

function parseAssignment(value: string): [name: string, address: string] | null {
  const index = value.indexOf("=");
  if (index <= 0 || index === value.length - 1) return null;
  return [value.slice(0, index), value.slice(index + 1)];
}

function parseOptions(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      list: { type: "boolean", short: "l", default: false },
      add: { type: "string", short: "a" },
      remove: { type: "string", short: "r" },
      show: { type: "boolean", short: "s", default: false },
      type: { type: "string", short: "t" },
      rescan: { type: "boolean", default: false },
      file: { type: "string", short: "f", default: config.INVENTORY_FILE },
      pretty: { type: "boolean", default: config.PRETTY_JSON },
      verbose: { type: "boolean", short: "v", default: false },
      config: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  }).values;
}

type ParsedOptions = ReturnType<typeof parseOptions>;

/**
 * Run the CLI
 * @returns process exit code
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));

  let values: ParsedOptions;
  try {
    values = parseOptions(argv);
  } catch (err) {
    stderr(err instanceof Error ? err.message : String(err));
    stderr("Try --help");
    return 2;
  }

  if (values.help) {
    stdout(USAGE);
    return 0;
  }
  if (values.verbose) setLogLevel("debug");
  if (values.config) {
    printConfig();
    return 0;
  }

  const file = values.file ?? config.INVENTORY_FILE;
  const pretty = values.pretty ?? config.PRETTY_JSON;
  let scanner = deps.scanner;
  const getScanner = (): CompositeScanner => (scanner ??= createScanner());

  try {
    const type: DeviceType | undefined =
      values.type === undefined ? undefined : resolveDeviceType(values.type);

    if (values.list) {
      const target = type === undefined ? getScanner() : getScanner().get(type);
      const devices = await target.listDevices({ rescan: values.rescan });
      for (const device of devices) {
        stdout(describeDevice(device));
      }
      if (devices.length === 0) stdout("No devices found");
      return 0;
    }

    if (values.add !== undefined) {
      const assignment = parseAssignment(values.add);
      if (!assignment) {
        stderr("--add expects name=address");
        return 2;
      }
      const [name, address] = assignment;
      const device = await withInventory(
        file,
        (manager) => manager.setByAddress(name, address, type),
        { scanner: getScanner(), create: true, autosave: true, pretty }
      );
      stdout(`Added ${name}: ${describeDevice(device)}`);
      return 0;
    }

    if (values.remove !== undefined) {
      const name = values.remove;
      await withInventory(file, (manager) => manager.remove(name, type), {
        scanner: getScanner(),
        autosave: true,
        pretty,
      });
      stdout(`Removed ${name}${type ? ` (${type})` : ""}`);
      return 0;
    }

    if (values.show) {
      const manager = await openInventory(file, { scanner: getScanner() });
      for (const [name, deviceType, device] of manager.entries()) {
        if (type !== undefined && deviceType !== type) continue;
        stdout(`${name}: ${describeDevice(device)}`);
      }
      if (manager.size === 0) stdout("Inventory is empty");
      return 0;
    }
  } catch (err) {
    if (err instanceof DeviceInventoryError) {
      stderr(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  stdout(USAGE);
  return 2;
}
