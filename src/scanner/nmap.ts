/**
 * nmap probe
 * Runs host-discovery scans and keeps every result, so later LAN scans can
 * include hosts that have not reached the neighbour table.
 */

import { config } from "../config";
import { DeviceType } from "../device/types";
import { ScanUnavailableError } from "../errors";
import { log } from "../log";
import { runCommand, type CommandRunner } from "./exec";
import type { RawLanDevice } from "./interface";
import { mergeLanResults, parseLooseMac } from "./neighbors";

export interface NmapProbeOptions {
  path?: string;
  timeoutMs?: number;
  run?: CommandRunner;
}

/**
 * Parse normal nmap output:
 *   Nmap scan report for 192.168.1.20
 *   Host is up (0.0012s latency).
 *   MAC Address: 00:11:22:33:44:55 (Vendor)
 */
export function parseNmapOutput(output: string): RawLanDevice[] {
  const found: RawLanDevice[] = [];
  let host: string | null = null;

  for (const line of output.split(/\r?\n/)) {
    const report = line.match(/^Nmap scan report for (?:\S+ \(([^)]+)\)|(\S+))/);
    if (report) {
      host = report[1] ?? report[2];
      continue;
    }

    const mac = line.match(/^MAC Address: (\S+)/);
    if (mac && host) {
      const macAddress = parseLooseMac(mac[1]);
      if (macAddress) found.push({ macAddress, addresses: [host] });
      host = null;
    }
  }

  return mergeLanResults(found);
}

export class NmapProbe {
  private readonly path: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;
  private entries: RawLanDevice[] = [];

  constructor(options: NmapProbeOptions = {}) {
    this.path = options.path ?? config.NMAP_PATH;
    this.timeoutMs = options.timeoutMs ?? config.NMAP_TIMEOUT;
    this.run = options.run ?? runCommand;
  }

  /**
   * Results of all previous scans, grouped by mac address
   */
  get results(): RawLanDevice[] {
    return mergeLanResults(this.entries);
  }

  clear(): void {
    this.entries = [];
  }

  /**
   * Host discovery on IPs, host names or subnets ("192.168.1.0/24").
   * A single string may hold several space-separated targets.
   */
  async scan(hosts: string | readonly string[]): Promise<RawLanDevice[]> {
    const targets = typeof hosts === "string" ? hosts.split(/\s+/).filter(Boolean) : [...hosts];
    if (targets.length === 0) return [];

    let output: string;
    try {
      output = await this.run(this.path, ["-sn", "-n", ...targets], this.timeoutMs);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ScanUnavailableError(DeviceType.LAN, `nmap failed: ${reason}`, { cause: err });
    }

    const found = parseNmapOutput(output);
    log.debug(`nmap: ${found.length} host(s) with mac address in ${targets.join(" ")}`);
    this.entries.push(...found);
    return found;
  }
}
