/**
 * USB Enumerator Tests
 * sysfs against a temporary directory tree, serialport with an injected port list
 */

import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import { mkdir, mkdtemp, realpath, rm, symlink, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  createUsbScanner,
  parseHexId,
  serialPortEnumerator,
  sysfsUsbEnumerator,
  usbDeviceFromRaw,
  type SerialPortListing,
} from "../../src/scanner";

async function writeAttributes(dir: string, attributes: Record<string, string>): Promise<void> {
  await mkdir(dir, { recursive: true });
  for (const [name, value] of Object.entries(attributes)) {
    await writeFile(join(dir, name), value);
  }
}

describe("sysfsUsbEnumerator", () => {
  let root: string;

  before(async () => {
    root = await mkdtemp(join(tmpdir(), "devinv-sysfs-"));
    await writeAttributes(join(root, "1-2"), {
      idVendor: "413c\n",
      idProduct: "2113\n",
      bcdDevice: "0110\n",
      busnum: "1\n",
      devnum: "4\n",
      serial: "  KB-01 \n",
    });
    // Interface of 1-2, not a device
    await writeAttributes(join(root, "1-2:1.0"), { bInterfaceClass: "03\n" });
    // Port without a device attached
    await writeAttributes(join(root, "2-1"), { busnum: "2\n" });
    // Device link whose target went away between listing and reading
    await symlink(join(root, "removed", "3-1"), join(root, "3-1"));
    await writeAttributes(join(root, "usb1"), {
      idVendor: "1d6b\n",
      idProduct: "0002\n",
      busnum: "1\n",
      devnum: "1\n",
    });
  });

  after(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("reads every device entry in name order", async () => {
    const devices = await sysfsUsbEnumerator(root)();

    assert.deepStrictEqual(devices, [
      {
        path: await realpath(join(root, "1-2")),
        devName: "/dev/bus/usb/001/004",
        vendorId: 0x413c,
        productId: 0x2113,
        revisionId: 0x0110,
        serial: "KB-01",
      },
      {
        path: await realpath(join(root, "usb1")),
        devName: "/dev/bus/usb/001/001",
        vendorId: 0x1d6b,
        productId: 0x0002,
        revisionId: undefined,
        serial: undefined,
      },
    ]);
  });

  it("skips entries removed during the scan", async () => {
    const devices = await sysfsUsbEnumerator(root)();
    assert.deepStrictEqual(
      devices.map((device) => device.vendorId),
      [0x413c, 0x1d6b]
    );
  });

  it("makes the device node an address alias", async () => {
    const scanner = createUsbScanner(sysfsUsbEnumerator(root));
    const found = await scanner.findDevices({ address: "/dev/bus/usb/001/004" });

    assert.strictEqual(found.length, 1);
    assert.strictEqual(found[0].serial, "KB-01");
  });

  it("fails when the directory cannot be read", async () => {
    const enumerate = sysfsUsbEnumerator(join(root, "missing"));
    await assert.rejects(enumerate, { name: "ScanUnavailableError" });
  });
});

describe("serialPortEnumerator", () => {
  const ports: SerialPortListing[] = [
    { path: "/dev/tty.usbserial-1410", vendorId: "1a86", productId: "7523", serialNumber: "A1" },
    { path: "/dev/tty.Bluetooth-Incoming-Port" },
    { path: "COM3", manufacturer: "FTDI", vendorId: "0403", productId: "6001", serialNumber: "" },
  ];

  it("keeps only ports with USB ids", async () => {
    let calls = 0;
    const enumerate = serialPortEnumerator(async () => {
      calls++;
      return ports;
    });

    assert.deepStrictEqual(await enumerate(), [
      { path: "/dev/tty.usbserial-1410", vendorId: 0x1a86, productId: 0x7523, serial: "A1" },
      { path: "COM3", vendorId: 0x0403, productId: 0x6001, serial: undefined },
    ]);
    assert.strictEqual(calls, 1);
  });

  it("feeds the USB scanner", async () => {
    const scanner = createUsbScanner(serialPortEnumerator(async () => ports));
    const found = await scanner.findDevices({ vendorId: 0x0403 });

    assert.strictEqual(found.length, 1);
    assert.strictEqual(found[0].address, "COM3");
  });
});

describe("USB helpers", () => {
  it("parses hex ids with or without prefix", () => {
    assert.strictEqual(parseHexId("413c"), 0x413c);
    assert.strictEqual(parseHexId("0x413C"), 0x413c);
    assert.strictEqual(parseHexId(" 0002\n"), 2);
    assert.strictEqual(parseHexId("zz"), undefined);
    assert.strictEqual(parseHexId(undefined), undefined);
  });

  it("converts raw descriptors to records", () => {
    const device = usbDeviceFromRaw({
      path: "/devices/usb1/1-2",
      devName: "/dev/bus/usb/001/004",
      vendorId: 0x413c,
      serial: "KB-01",
    });
    assert.strictEqual(device.address, "/devices/usb1/1-2");
    assert.deepStrictEqual(device.addressAliases, ["/dev/bus/usb/001/004"]);
    assert.deepStrictEqual(device.uniqueIdentifier, {
      vendorId: 0x413c,
      productId: null,
      serial: "KB-01",
    });
  });
});
