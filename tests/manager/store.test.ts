/**
 * Device Store Tests
 */

import { describe, it, beforeEach } from "node:test";
import assert from "node:assert";
import { DeviceStore } from "../../src/manager";
import { DeviceTypeMap, LanDevice, UsbDevice } from "../../src/device";
import { DeviceKeyError, UnknownTypeError } from "../../src/errors";

describe("DeviceStore", () => {
  let store: DeviceStore;
  let usb: UsbDevice;
  let lan: LanDevice;

  beforeEach(() => {
    store = new DeviceStore();
    usb = new UsbDevice({ address: "/devices/usb1/1-2", vendorId: 0x2341, productId: 0x0043 });
    lan = new LanDevice({ address: "192.168.1.40", macAddress: "00:11:22:33:44:66" });
  });

  it("collapses a name holding one type and expands it holding more", () => {
    store.set("board", usb);
    assert.strictEqual(store.get("board"), usb);

    store.set("board", lan);
    const both = store.get("board");
    assert.ok(both instanceof DeviceTypeMap);
    assert.strictEqual(both.get("usb"), usb);
    assert.strictEqual(both.get(LanDevice), lan);
    assert.strictEqual(both.size, 2);

    store.remove("board", "lan");
    assert.strictEqual(store.get("board"), usb);
  });

  it("gets a single type with any key form", () => {
    store.set("board", usb);
    store.set("board", lan);

    assert.strictEqual(store.get("board", "USB"), usb);
    assert.strictEqual(store.get("board", UsbDevice), usb);
    assert.strictEqual(store.get("board", new LanDevice()), lan);
  });

  it("overwrites the record of the same name and type", () => {
    const replacement = new UsbDevice({ address: "/devices/usb1/1-3", vendorId: 0x2341, productId: 0x0043 });
    store.set("board", usb);
    store.set("board", replacement);

    assert.strictEqual(store.get("board"), replacement);
    assert.strictEqual(store.entries().length, 1);
  });

  it("always returns a type map from getAll", () => {
    store.set("board", usb);
    const all = store.getAll("board");
    assert.deepStrictEqual(all.keys(), ["usb"]);
  });

  it("raises DeviceKeyError for absent names and pairs", () => {
    store.set("board", usb);

    assert.throws(() => store.get("printer"), {
      name: "DeviceKeyError",
      message: 'No device stored as "printer"',
    });
    assert.throws(() => store.get("board", "lan"), {
      name: "DeviceKeyError",
      message: 'No lan device stored as "board"',
    });
    assert.throws(() => store.remove("printer"), DeviceKeyError);
    assert.throws(() => store.remove("board", "lan"), DeviceKeyError);
  });

  it("raises UnknownTypeError for unknown type keys", () => {
    store.set("board", usb);
    assert.throws(() => store.get("board", "bluetooth"), UnknownTypeError);
  });

  it("removes every type of a name without a type", () => {
    store.set("board", usb);
    store.set("board", lan);
    store.set("printer", new LanDevice({ macAddress: "00:11:22:33:44:77" }));

    store.remove("board");
    assert.strictEqual(store.has("board"), false);
    assert.deepStrictEqual(store.keys(), ["printer"]);
  });

  it("counts names, not records", () => {
    store.set("board", usb);
    store.set("board", lan);
    store.set("printer", new LanDevice({ macAddress: "00:11:22:33:44:77" }));

    assert.strictEqual(store.size, 2);
    assert.deepStrictEqual(store.keys(), ["board", "printer"]);
    assert.deepStrictEqual([...store], ["board", "printer"]);
    assert.strictEqual(store.has("board"), true);
    assert.strictEqual(store.has("board", "usb"), true);
    assert.strictEqual(store.has("printer", "usb"), false);
    assert.strictEqual(store.entries().length, 3);
  });

  it("presents values and items collapsed", () => {
    const printer = new LanDevice({ macAddress: "00:11:22:33:44:77" });
    store.set("board", usb);
    store.set("board", lan);
    store.set("printer", printer);

    const [board, single] = store.values();
    assert.ok(board instanceof DeviceTypeMap);
    assert.strictEqual(single, printer);

    const items = store.items();
    assert.strictEqual(items[1][0], "printer");
    assert.strictEqual(items[1][1], printer);
  });

  it("lists (name, type, record) triples", () => {
    store.set("board", usb);
    store.set("board", lan);
    assert.deepStrictEqual(
      store.entries().map(([name, type]) => [name, type]),
      [
        ["board", "usb"],
        ["board", "lan"],
      ]
    );
  });

  it("clears everything", () => {
    store.set("board", usb);
    store.set("printer", lan);
    store.clear();

    assert.strictEqual(store.size, 0);
    assert.deepStrictEqual(store.keys(), []);
  });
});
