/**
 * Scanner Module
 * Re-exports scanners, platform enumerators and the mock
 */

export * from "./interface";
export * from "./base";
export * from "./composite";
export * from "./exec";
export * from "./neighbors";
export * from "./nmap";
export * from "./usb";
export * from "./usb-sysfs";
export * from "./usb-serialport";
export * from "./lan";
export * from "./platform";
export * from "./mock";
