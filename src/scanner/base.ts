/**
 * Caching Scanner
 *
 * Wraps one platform enumerator. The first call (or any call with rescan)
 * enumerates and replaces the cache wholesale; other calls reuse the cache.
 * A failed enumeration leaves the previous cache untouched.
 */

import type { DeviceRecord } from "../device/device";
import type { FieldAccessor, FieldAccessors } from "../device/fields";
import type { DeviceFilter, DeviceType, FilterValue, ScanOptions } from "../device/types";
import { InvalidFilterError, ScanUnavailableError } from "../errors";
import { log } from "../log";
import type { Enumerator, ScanState, TypedDeviceScanner } from "./interface";

export interface CachingScannerOptions<D extends DeviceRecord, R> {
  type: DeviceType;
  enumerate: Enumerator<R>;
  /** Returns undefined for raw descriptors that do not describe a usable device */
  convert: (raw: R) => D | undefined;
  fields: FieldAccessors<D>;
}

type ActiveFilter<D> = [FieldAccessor<D>, FilterValue];

export class CachingScanner<D extends DeviceRecord, R = D> implements TypedDeviceScanner<D> {
  readonly type: DeviceType;
  private readonly enumerate: Enumerator<R>;
  private readonly convert: (raw: R) => D | undefined;
  private readonly fields: FieldAccessors<D>;
  private cache: readonly D[] | null = null;

  constructor(options: CachingScannerOptions<D, R>) {
    this.type = options.type;
    this.enumerate = options.enumerate;
    this.convert = options.convert;
    this.fields = options.fields;
  }

  get state(): ScanState {
    return this.cache === null ? "unscanned" : "cached";
  }

  /**
   * Result of the last successful scan, if any
   */
  get cached(): readonly D[] | undefined {
    return this.cache ?? undefined;
  }

  get filterFields(): string[] {
    return Object.keys(this.fields);
  }

  async listDevices({ rescan = false }: ScanOptions = {}): Promise<readonly D[]> {
    if (this.cache !== null && !rescan) {
      return this.cache;
    }

    const raw = await this.runEnumerator();
    const devices: D[] = [];
    for (const item of raw) {
      const device = this.convert(item);
      if (device) {
        devices.push(device);
      } else {
        log.debug(`${this.type}: skipped unusable descriptor`, item);
      }
    }

    this.cache = Object.freeze(devices);
    log.debug(`${this.type}: scan found ${devices.length} device(s)`);
    return this.cache;
  }

  /**
   * @throws InvalidFilterError before scanning if a filter names an unknown field
   */
  async findDevices(filters: DeviceFilter, options: ScanOptions = {}): Promise<readonly D[]> {
    const active = this.prepareFilters(filters);
    const devices = await this.listDevices(options);
    return devices.filter((device) =>
      active.every(([field, expected]) => field.matches(device, expected))
    );
  }

  private prepareFilters(filters: DeviceFilter): ActiveFilter<D>[] {
    const active: ActiveFilter<D>[] = [];
    for (const [name, value] of Object.entries(filters)) {
      if (value === undefined) continue;
      if (!Object.hasOwn(this.fields, name)) {
        throw new InvalidFilterError(this.type, name);
      }
      const field = this.fields[name];
      active.push([field, field.normalize ? field.normalize(value) : value]);
    }
    return active;
  }

  private async runEnumerator(): Promise<R[]> {
    try {
      return await this.enumerate();
    } catch (err) {
      if (err instanceof ScanUnavailableError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new ScanUnavailableError(this.type, reason, { cause: err });
    }
  }
}
