/**
 * Platform Selection Tests
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import { createScanner, platformEnumerators, type CommandRunner } from "../../src/scanner";
import { UnsupportedPlatformError } from "../../src/errors";

describe("platform selection", () => {
  it("rejects hosts without enumerators", () => {
    assert.throws(() => platformEnumerators({ platform: "aix" }), UnsupportedPlatformError);
    assert.throws(() => createScanner({ platform: "aix" }), {
      message: 'The platform "aix" is not supported',
    });
  });

  it("uses ip neigh on linux", async () => {
    const commands: string[] = [];
    const run: CommandRunner = async (command, args) => {
      commands.push([command, ...args].join(" "));
      return "192.168.1.1 dev eth0 lladdr 00:11:22:33:44:55 REACHABLE\n";
    };

    const scanner = createScanner({ platform: "linux", run, nmap: null });
    const devices = await scanner.get("lan").listDevices();

    assert.deepStrictEqual(commands, ["ip neigh show"]);
    assert.strictEqual(devices.length, 1);
    assert.deepStrictEqual(scanner.types(), ["usb", "lan"]);
  });

  it("uses serialport and arp -a on macOS and Windows", async () => {
    for (const platform of ["darwin", "win32"]) {
      const commands: string[] = [];
      const scanner = createScanner({
        platform,
        nmap: null,
        run: async (command, args) => {
          commands.push([command, ...args].join(" "));
          return "";
        },
        listPorts: async () => [{ path: "COM4", vendorId: "2341", productId: "0043" }],
      });

      const usb = await scanner.get("usb").listDevices();
      await scanner.get("lan").listDevices();

      assert.strictEqual(usb[0].address, "COM4");
      assert.deepStrictEqual(commands, ["arp -a"]);
    }
  });
});
