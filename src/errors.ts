/**
 * Error taxonomy
 * Enumerator and key-resolution failures propagate to the caller unchanged;
 * only the composite scanner absorbs InvalidFilterError per sub-scanner.
 */

export class DeviceInventoryError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

function describeKey(key: unknown): string {
  if (typeof key === "string") return JSON.stringify(key);
  if (typeof key === "function") return key.name || "<anonymous class>";
  if (key !== null && typeof key === "object") return `instance of ${key.constructor.name}`;
  return String(key);
}

export class UnknownTypeError extends DeviceInventoryError {
  readonly key: unknown;

  constructor(key: unknown) {
    super(`Unknown device type: ${describeKey(key)}`);
    this.key = key;
  }
}

export class InvalidFilterError extends DeviceInventoryError {
  readonly deviceType: string;
  readonly field: string;

  constructor(deviceType: string, field: string) {
    super(`"${field}" is not a filterable field of ${deviceType} devices`);
    this.deviceType = deviceType;
    this.field = field;
  }
}

export class ScanUnavailableError extends DeviceInventoryError {
  readonly deviceType: string;

  constructor(deviceType: string, reason: string, options?: ErrorOptions) {
    super(`${deviceType} scan unavailable: ${reason}`, options);
    this.deviceType = deviceType;
  }
}

export class DeviceNotFoundError extends DeviceInventoryError {
  readonly address: string;
  readonly deviceType?: string;

  constructor(address: string, deviceType?: string) {
    super(`No ${deviceType ? `${deviceType}-` : ""}device was found for address "${address}"`);
    this.address = address;
    this.deviceType = deviceType;
  }
}

/**
 * Lookup or removal of a name (or name/type pair) the store does not hold
 */
export class DeviceKeyError extends DeviceInventoryError {
  readonly deviceName: string;
  readonly deviceType?: string;

  constructor(deviceName: string, deviceType?: string) {
    super(
      deviceType
        ? `No ${deviceType} device stored as "${deviceName}"`
        : `No device stored as "${deviceName}"`
    );
    this.deviceName = deviceName;
    this.deviceType = deviceType;
  }
}

export class InvalidMacAddressError extends DeviceInventoryError {
  readonly value: string;

  constructor(value: string) {
    super(`Invalid mac address format: ${value}`);
    this.value = value;
  }
}

export class InventoryFormatError extends DeviceInventoryError {}

export class UnsupportedPlatformError extends DeviceInventoryError {
  readonly platform: string;

  constructor(platform: string) {
    super(`The platform "${platform}" is not supported`);
    this.platform = platform;
  }
}
