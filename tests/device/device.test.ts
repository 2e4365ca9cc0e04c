/**
 * Device Record Tests
 */

import { describe, it, afterEach } from "node:test";
import assert from "node:assert";
import {
  LanDevice,
  UsbDevice,
  UsbIdDatabase,
  formatMac,
  useUsbIdDatabase,
} from "../../src/device";
import { InvalidMacAddressError } from "../../src/errors";

describe("DeviceRecord", () => {
  describe("addresses", () => {
    it("drops duplicate aliases and the main address", () => {
      const device = new UsbDevice({
        address: "/devices/pci0000:00/usb1/1-2",
        addressAliases: ["/dev/bus/usb/001/004", "/devices/pci0000:00/usb1/1-2", "/dev/bus/usb/001/004"],
      });

      assert.deepStrictEqual(device.addressAliases, ["/dev/bus/usb/001/004"]);
      assert.deepStrictEqual(device.allAddresses, [
        "/devices/pci0000:00/usb1/1-2",
        "/dev/bus/usb/001/004",
      ]);
    });

    it("removes an alias promoted to main address", () => {
      const device = new LanDevice({ address: "192.168.1.20", addressAliases: ["192.168.1.21"] });
      device.address = "192.168.1.21";

      assert.strictEqual(device.address, "192.168.1.21");
      assert.deepStrictEqual(device.addressAliases, []);
    });

    it("moves addresses to previousAddresses on reset", () => {
      const device = new LanDevice({ address: "192.168.1.20", addressAliases: ["10.0.0.5"] });
      device.resetAddresses();

      assert.strictEqual(device.address, undefined);
      assert.deepStrictEqual(device.allAddresses, []);
      assert.deepStrictEqual(device.previousAddresses, ["192.168.1.20", "10.0.0.5"]);
    });
  });

  describe("identity", () => {
    it("treats records with equal identifiers as the same device", () => {
      const a = new UsbDevice({ address: "/devices/a", vendorId: 0x413c, productId: 0x2113, serial: "SN-1" });
      const b = new UsbDevice({ address: "/devices/b", vendorId: 0x413c, productId: 0x2113, serial: "SN-1" });
      const c = new UsbDevice({ address: "/devices/a", vendorId: 0x413c, productId: 0x2113, serial: "SN-2" });

      assert.strictEqual(a.isSameDevice(b), true);
      assert.strictEqual(a.isSameDevice(c), false);
    });

    it("never matches records of another type", () => {
      const usb = new UsbDevice();
      const lan = new LanDevice();
      assert.strictEqual(usb.isSameDevice(lan), false);
    });

    it("reports absent identity fields as null", () => {
      const device = new UsbDevice({ vendorId: 0x0bda });
      assert.deepStrictEqual(device.uniqueIdentifier, {
        vendorId: 0x0bda,
        productId: null,
        serial: null,
      });
    });
  });

  describe("updateFrom", () => {
    it("takes over addresses and fields of a scanned record", () => {
      const stored = new UsbDevice({
        address: "/devices/old",
        vendorId: 0x413c,
        productId: 0x2113,
        serial: "SN-1",
      });
      const scanned = new UsbDevice({
        address: "/devices/new",
        addressAliases: ["/dev/bus/usb/001/005"],
        vendorId: 0x413c,
        productId: 0x2113,
        revisionId: 0x0110,
        serial: "SN-1",
      });

      stored.updateFrom(scanned);

      assert.strictEqual(stored.address, "/devices/new");
      assert.deepStrictEqual(stored.addressAliases, ["/dev/bus/usb/001/005"]);
      assert.deepStrictEqual(stored.previousAddresses, ["/devices/old"]);
      assert.strictEqual(stored.revisionId, 0x0110);
    });

    it("does not keep a current address in previousAddresses", () => {
      const stored = new LanDevice({ address: "192.168.1.20", macAddress: "00:11:22:33:44:55" });
      stored.updateFrom(new LanDevice({ address: "192.168.1.20", macAddress: "00:11:22:33:44:55" }));

      assert.deepStrictEqual(stored.previousAddresses, []);
    });

    it("rejects a record of another type", () => {
      const usb = new UsbDevice();
      assert.throws(() => usb.updateFrom(new LanDevice()), TypeError);
    });
  });

  describe("UsbDevice", () => {
    afterEach(() => {
      useUsbIdDatabase(null);
    });

    it("serializes present fields only", () => {
      const device = new UsbDevice({ address: "/devices/a", vendorId: 0x413c, serial: "SN-1" });
      assert.deepStrictEqual(device.toJSON(), {
        type: "usb",
        address: "/devices/a",
        vendor_id: 0x413c,
        serial: "SN-1",
      });
    });

    it("reads older files with null fields", () => {
      const device = UsbDevice.fromJSON({ type: "usb", address: null, vendor_id: 4660, serial: null });
      assert.strictEqual(device.address, undefined);
      assert.strictEqual(device.vendorId, 4660);
      assert.strictEqual(device.serial, undefined);
    });

    it("moves stored addresses to previousAddresses when stale", () => {
      const device = UsbDevice.fromJSON(
        { type: "usb", address: "/devices/a", address_aliases: ["/dev/bus/usb/002/003"] },
        true
      );
      assert.strictEqual(device.address, undefined);
      assert.deepStrictEqual(device.previousAddresses, ["/devices/a", "/dev/bus/usb/002/003"]);
    });

    it("names vendor and product from the usb.ids database", () => {
      useUsbIdDatabase(
        UsbIdDatabase.parse("413c  Dell Computer Corp.\n\t2113  KB216 Wired Keyboard\n")
      );
      const device = new UsbDevice({ vendorId: 0x413c, productId: 0x2113 });

      assert.strictEqual(device.vendorName, "Dell Computer Corp.");
      assert.strictEqual(device.productName, "KB216 Wired Keyboard");
    });
  });

  describe("LanDevice", () => {
    it("normalizes mac addresses on assignment", () => {
      const device = new LanDevice();
      device.macAddress = "01-23-45-67-89-ab";
      assert.strictEqual(device.macAddress, "01:23:45:67:89:AB");

      device.macAddress = "01:23:45:67:89:AB";
      assert.strictEqual(device.macAddress, "01:23:45:67:89:AB");
    });

    it("accepts dot separators", () => {
      assert.strictEqual(formatMac("0a.1b.2c.3d.4e.5f"), "0A:1B:2C:3D:4E:5F");
    });

    it("rejects malformed mac addresses", () => {
      assert.throws(() => new LanDevice({ macAddress: "01:23:45" }), InvalidMacAddressError);
      assert.throws(() => formatMac("01:23:45:67:89:zz"), {
        message: "Invalid mac address format: 01:23:45:67:89:zz",
      });
    });

    it("serializes with snake_case keys", () => {
      const device = new LanDevice({
        address: "192.168.1.20",
        addressAliases: ["192.168.1.21"],
        macAddress: "00-11-22-33-44-55",
      });
      assert.deepStrictEqual(device.toJSON(), {
        type: "lan",
        address: "192.168.1.20",
        address_aliases: ["192.168.1.21"],
        mac_address: "00:11:22:33:44:55",
      });
      assert.deepStrictEqual(new LanDevice().toJSON(), { type: "lan" });
    });
  });
});
