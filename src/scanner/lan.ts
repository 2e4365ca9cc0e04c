/**
 * LAN Device Scanner
 * Reads the host's neighbour table and merges in earlier nmap results.
 */

import { config } from "../config";
import { LanDevice, LAN_FIELDS } from "../device/lan";
import { DeviceType } from "../device/types";
import { InvalidMacAddressError, ScanUnavailableError } from "../errors";
import { log } from "../log";
import { CachingScanner } from "./base";
import { runCommand, type CommandRunner } from "./exec";
import type { Enumerator, RawLanDevice } from "./interface";
import { mergeLanResults, parseNeighborTable } from "./neighbors";
import type { NmapProbe } from "./nmap";

export type NeighborCommand = readonly [command: string, args: readonly string[]];

export interface NeighborTableOptions {
  /** Tried in order until one succeeds with entries */
  commands: readonly NeighborCommand[];
  run?: CommandRunner;
  timeoutMs?: number;
}

export function neighborTableEnumerator(options: NeighborTableOptions): Enumerator<RawLanDevice> {
  const run = options.run ?? runCommand;
  const timeoutMs = options.timeoutMs ?? config.COMMAND_TIMEOUT;

  return async () => {
    const failures: string[] = [];
    let succeeded = false;

    for (const [command, args] of options.commands) {
      let output: string;
      try {
        output = await run(command, args, timeoutMs);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        log.debug(`${command} ${args.join(" ")} failed: ${reason}`);
        failures.push(`${command}: ${reason}`);
        continue;
      }

      succeeded = true;
      const devices = parseNeighborTable(output);
      if (devices.length > 0) return devices;
    }

    if (!succeeded) {
      throw new ScanUnavailableError(
        DeviceType.LAN,
        `no neighbour table available (${failures.join("; ")})`
      );
    }
    return [];
  };
}

export function lanDeviceFromRaw(raw: RawLanDevice): LanDevice | undefined {
  try {
    const [address, ...aliases] = raw.addresses;
    return new LanDevice({ address, addressAliases: aliases, macAddress: raw.macAddress });
  } catch (err) {
    if (err instanceof InvalidMacAddressError) return undefined;
    throw err;
  }
}

export class LanScanner extends CachingScanner<LanDevice, RawLanDevice> {
  readonly nmap: NmapProbe | null;

  constructor(enumerate: Enumerator<RawLanDevice>, nmap: NmapProbe | null = null) {
    super({
      type: DeviceType.LAN,
      enumerate: async () => mergeLanResults(await enumerate(), nmap?.results ?? []),
      convert: lanDeviceFromRaw,
      fields: LAN_FIELDS,
    });
    this.nmap = nmap;
  }

  /**
   * Probe hosts with nmap, then rescan so the cache includes the results
   */
  async probe(hosts: readonly string[]): Promise<boolean> {
    // Device paths ("/devices/...", "/dev/ttyUSB0") are not network hosts
    const targets = hosts.filter((host) => host !== "" && !host.startsWith("/"));
    if (!this.nmap || targets.length === 0) return false;
    await this.nmap.scan(targets);
    await this.listDevices({ rescan: true });
    return true;
  }
}
