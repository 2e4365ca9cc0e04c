/**
 * Neighbour table parsing
 * Handles `ip neigh`, Linux `arp -n`, BSD/macOS `arp -a` and Windows `arp -a` output.
 */

import type { RawLanDevice } from "./interface";

const LINE_PATTERNS: RegExp[] = [
  // ip neigh: "192.168.1.1 dev eth0 lladdr 00:11:22:33:44:55 REACHABLE"
  /^(\S+)\s+dev\s+\S+\s+lladdr\s+(\S+)/,
  // BSD/macOS: "? (192.168.1.1) at 0:11:22:33:44:55 on en0 ifscope [ethernet]"
  /\((\d{1,3}(?:\.\d{1,3}){3})\)\s+at\s+(\S+)/,
  // Linux arp -n: "192.168.1.1  ether  00:11:22:33:44:55  C  eth0"
  /^(\d{1,3}(?:\.\d{1,3}){3})\s+\w+\s+([0-9A-Fa-f:]{17})(?:\s|$)/,
  // Windows: "  192.168.1.1          00-11-22-33-44-55     dynamic"
  /^\s*(\d{1,3}(?:\.\d{1,3}){3})\s+([0-9A-Fa-f-]{17})(?:\s|$)/,
];

const IGNORED_MACS = new Set(["FF:FF:FF:FF:FF:FF", "00:00:00:00:00:00"]);

/**
 * Canonical mac from neighbour-table output; tolerates dropped leading zeros ("0:1b:...")
 */
export function parseLooseMac(text: string): string | undefined {
  const parts = text.split(/[:-]/);
  if (parts.length !== 6) return undefined;
  if (!parts.every((part) => /^[0-9A-Fa-f]{1,2}$/.test(part))) return undefined;
  return parts.map((part) => part.padStart(2, "0")).join(":").toUpperCase();
}

/**
 * Group IP/mac pairs by mac address, keeping first-seen order.
 * The first IP becomes the address, later ones aliases.
 */
export function mergeLanResults(...lists: RawLanDevice[][]): RawLanDevice[] {
  const byMac = new Map<string, RawLanDevice>();
  for (const list of lists) {
    for (const entry of list) {
      const known = byMac.get(entry.macAddress);
      if (known) {
        for (const address of entry.addresses) {
          if (!known.addresses.includes(address)) known.addresses.push(address);
        }
      } else {
        byMac.set(entry.macAddress, {
          macAddress: entry.macAddress,
          addresses: [...new Set(entry.addresses)],
        });
      }
    }
  }
  return [...byMac.values()];
}

export function parseNeighborTable(output: string): RawLanDevice[] {
  const pairs: RawLanDevice[] = [];

  for (const line of output.split(/\r?\n/)) {
    for (const pattern of LINE_PATTERNS) {
      const match = line.match(pattern);
      if (!match) continue;

      const mac = parseLooseMac(match[2]);
      if (mac && !IGNORED_MACS.has(mac)) {
        pairs.push({ macAddress: mac, addresses: [match[1]] });
      }
      break;
    }
  }

  return mergeLanResults(pairs);
}
