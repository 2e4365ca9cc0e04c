/**
 * Device Module
 * Re-exports records, the type registry and helpers
 */

export * from "./types";
export * from "./device";
export * from "./fields";
export * from "./usb";
export * from "./lan";
export * from "./usb-ids";
export * from "./registry";
export * from "./type-map";
