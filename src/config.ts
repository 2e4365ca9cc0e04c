/**
 * Configuration from environment variables
 * Open/Closed principle - config through ENV, not hardcode
 */

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

export const config = {
  /**
   * Log level: debug, info, warn, error, silent
   * @env DEVINV_LOG_LEVEL
   * @default "info"
   */
  LOG_LEVEL: getEnvString("DEVINV_LOG_LEVEL", "info"),

  /**
   * Inventory file used by the CLI when --file is not given
   * @env DEVINV_INVENTORY_FILE
   * @default "devices.json"
   */
  INVENTORY_FILE: getEnvString("DEVINV_INVENTORY_FILE", "devices.json"),

  /**
   * Indent saved inventories
   * @env DEVINV_PRETTY_JSON
   * @default false
   */
  PRETTY_JSON: getEnvBoolean("DEVINV_PRETTY_JSON", false),

  /**
   * Timeout for ip/arp commands in milliseconds
   * @env DEVINV_COMMAND_TIMEOUT
   * @default 5000
   */
  COMMAND_TIMEOUT: getEnvNumber("DEVINV_COMMAND_TIMEOUT", 5000),

  /**
   * Allow probing the LAN with nmap
   * @env DEVINV_NMAP_ENABLED
   * @default true
   */
  NMAP_ENABLED: getEnvBoolean("DEVINV_NMAP_ENABLED", true),

  /**
   * nmap executable
   * @env DEVINV_NMAP_PATH
   * @default "nmap"
   */
  NMAP_PATH: getEnvString("DEVINV_NMAP_PATH", "nmap"),

  /**
   * Timeout for a single nmap run in milliseconds
   * @env DEVINV_NMAP_TIMEOUT
   * @default 60000
   */
  NMAP_TIMEOUT: getEnvNumber("DEVINV_NMAP_TIMEOUT", 60000),

  /**
   * Linux sysfs directory listing USB devices
   * @env DEVINV_SYSFS_USB_ROOT
   * @default "/sys/bus/usb/devices"
   */
  SYSFS_USB_ROOT: getEnvString("DEVINV_SYSFS_USB_ROOT", "/sys/bus/usb/devices"),

  /**
   * usb.ids database (empty: search the usual system locations)
   * @env DEVINV_USB_IDS_PATH
   * @default ""
   */
  USB_IDS_PATH: getEnvString("DEVINV_USB_IDS_PATH", ""),
};

/**
 * Print current configuration (for debugging)
 */
export function printConfig(): void {
  console.log("Device Inventory Configuration:");
  console.log(`  Log Level:       ${config.LOG_LEVEL}`);
  console.log(`  Inventory File:  ${config.INVENTORY_FILE}`);
  console.log(`  Pretty JSON:     ${config.PRETTY_JSON}`);
  console.log(`  Command Timeout: ${config.COMMAND_TIMEOUT}ms`);
  console.log(`  nmap:            ${config.NMAP_ENABLED ? config.NMAP_PATH : "(disabled)"}`);
  console.log(`  sysfs USB Root:  ${config.SYSFS_USB_ROOT}`);
  console.log(`  usb.ids:         ${config.USB_IDS_PATH || "(system default)"}`);
}
