/**
 * Device Inventory - Library Entry
 * Named USB/LAN devices that can be found again after their addresses change
 */

export * from "./errors";
export * from "./device";
export * from "./scanner";
export * from "./manager";
export { config, printConfig } from "./config";
export { log, setLogLevel, getLogLevel, type LogLevel } from "./log";
export { runCli, describeDevice, type CliDeps } from "./cli";
