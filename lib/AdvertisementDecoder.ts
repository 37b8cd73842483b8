/**
 * AdvertisementDecoder - Boundary to beacon advertisement parsing
 *
 * The poller treats advertisement bytes as opaque. Consumers that want
 * structure plug a decoder in here. `GapAdvertisementDecoder` splits a payload
 * into generic Bluetooth LE GAP AD structures (length, type, data) and leaves
 * manufacturer-specific fields as raw bytes keyed by company ID.
 *
 * @example
 * ```typescript
 * const result = parseAdvertisement(record);
 * if (result.ok) {
 *   const ruuvi = result.advertisement.manufacturerData.get(0x0499);
 * }
 * ```
 */

import type { BeaconRecord } from './types';

/**
 * Structured view of an advertisement
 */
export interface Advertisement {
  flags?: number;
  localName?: string;
  txPower?: number;
  serviceUuids: string[];
  /** Service UUID to service data bytes */
  serviceData: Map<string, Uint8Array>;
  /** Company ID to manufacturer data bytes (company ID stripped) */
  manufacturerData: Map<number, Uint8Array>;
}

export type AdvertisementResult =
  | { ok: true; advertisement: Advertisement }
  | { ok: false; message: string };

export interface AdvertisementDecoder {
  decode(payload: Uint8Array): AdvertisementResult;
}

/**
 * GAP AD type codes handled by the default decoder
 */
export enum AdType {
  FLAGS = 0x01,
  INCOMPLETE_UUID16 = 0x02,
  COMPLETE_UUID16 = 0x03,
  INCOMPLETE_UUID32 = 0x04,
  COMPLETE_UUID32 = 0x05,
  INCOMPLETE_UUID128 = 0x06,
  COMPLETE_UUID128 = 0x07,
  SHORT_LOCAL_NAME = 0x08,
  COMPLETE_LOCAL_NAME = 0x09,
  TX_POWER = 0x0a,
  SERVICE_DATA_UUID16 = 0x16,
  SERVICE_DATA_UUID32 = 0x20,
  SERVICE_DATA_UUID128 = 0x21,
  MANUFACTURER_DATA = 0xff,
}

const BASE_UUID_SUFFIX = '-0000-1000-8000-00805f9b34fb';

/**
 * Formats a little-endian UUID field as a lower-case 128-bit UUID string.
 * 16- and 32-bit UUIDs are expanded against the Bluetooth base UUID.
 */
export function formatUuid(bytes: Uint8Array): string {
  const hex = Buffer.from(bytes).reverse().toString('hex');
  if (bytes.length === 2 || bytes.length === 4) {
    return `${hex.padStart(8, '0')}${BASE_UUID_SUFFIX}`;
  }
  return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20)].join('-');
}

export class GapAdvertisementDecoder implements AdvertisementDecoder {
  /**
   * Splits the payload into AD structures.
   *
   * A zero length byte ends parsing (trailing padding). A structure that
   * runs past the end of the payload fails the decode.
   */
  public decode(payload: Uint8Array): AdvertisementResult {
    const advertisement: Advertisement = {
      serviceUuids: [],
      serviceData: new Map(),
      manufacturerData: new Map(),
    };

    let offset = 0;
    while (offset < payload.length) {
      const length = payload[offset];
      if (length === 0) {
        break;
      }
      const end = offset + 1 + length;
      if (end > payload.length) {
        return {
          ok: false,
          message: `AD structure at offset ${offset} needs ${length} bytes, ${payload.length - offset - 1} available`,
        };
      }

      const type = payload[offset + 1];
      const data = payload.subarray(offset + 2, end);
      this.apply(advertisement, type, data);
      offset = end;
    }

    return { ok: true, advertisement };
  }

  private apply(advertisement: Advertisement, type: number, data: Uint8Array): void {
    switch (type) {
      case AdType.FLAGS:
        if (data.length > 0) {
          advertisement.flags = data[0];
        }
        break;
      case AdType.INCOMPLETE_UUID16:
      case AdType.COMPLETE_UUID16:
        this.addUuids(advertisement, data, 2);
        break;
      case AdType.INCOMPLETE_UUID32:
      case AdType.COMPLETE_UUID32:
        this.addUuids(advertisement, data, 4);
        break;
      case AdType.INCOMPLETE_UUID128:
      case AdType.COMPLETE_UUID128:
        this.addUuids(advertisement, data, 16);
        break;
      case AdType.SHORT_LOCAL_NAME:
        // complete name wins whichever order they arrive in
        if (advertisement.localName === undefined) {
          advertisement.localName = Buffer.from(data).toString('utf8');
        }
        break;
      case AdType.COMPLETE_LOCAL_NAME:
        advertisement.localName = Buffer.from(data).toString('utf8');
        break;
      case AdType.TX_POWER:
        if (data.length > 0) {
          advertisement.txPower = (data[0] << 24) >> 24;
        }
        break;
      case AdType.SERVICE_DATA_UUID16:
        this.addServiceData(advertisement, data, 2);
        break;
      case AdType.SERVICE_DATA_UUID32:
        this.addServiceData(advertisement, data, 4);
        break;
      case AdType.SERVICE_DATA_UUID128:
        this.addServiceData(advertisement, data, 16);
        break;
      case AdType.MANUFACTURER_DATA:
        if (data.length >= 2) {
          advertisement.manufacturerData.set(data[0] | (data[1] << 8), data.slice(2));
        }
        break;
      default:
        break;
    }
  }

  private addUuids(advertisement: Advertisement, data: Uint8Array, size: number): void {
    for (let i = 0; i + size <= data.length; i += size) {
      const uuid = formatUuid(data.subarray(i, i + size));
      if (!advertisement.serviceUuids.includes(uuid)) {
        advertisement.serviceUuids.push(uuid);
      }
    }
  }

  private addServiceData(advertisement: Advertisement, data: Uint8Array, size: number): void {
    if (data.length < size) {
      return;
    }
    advertisement.serviceData.set(formatUuid(data.subarray(0, size)), data.slice(size));
  }
}

const defaultDecoder = new GapAdvertisementDecoder();

/**
 * Decodes a record's payload with the given decoder (GAP by default).
 */
export function parseAdvertisement(
  record: BeaconRecord,
  decoder: AdvertisementDecoder = defaultDecoder
): AdvertisementResult {
  return decoder.decode(record.payload);
}

/**
 * One-line summary for logs, e.g. `flags=0x06 uuids=0000feaa-... mfr=0x0499(24B)`.
 */
export function summarizeAdvertisement(advertisement: Advertisement): string {
  const parts: string[] = [];
  if (advertisement.localName !== undefined) {
    parts.push(`name=${advertisement.localName}`);
  }
  if (advertisement.flags !== undefined) {
    parts.push(`flags=0x${advertisement.flags.toString(16).padStart(2, '0')}`);
  }
  if (advertisement.txPower !== undefined) {
    parts.push(`tx=${advertisement.txPower}dBm`);
  }
  if (advertisement.serviceUuids.length > 0) {
    parts.push(`uuids=${advertisement.serviceUuids.join(',')}`);
  }
  for (const [uuid, data] of advertisement.serviceData) {
    parts.push(`svc=${uuid}(${data.length}B)`);
  }
  for (const [companyId, data] of advertisement.manufacturerData) {
    parts.push(`mfr=0x${companyId.toString(16).padStart(4, '0')}(${data.length}B)`);
  }
  return parts.length > 0 ? parts.join(' ') : '(empty)';
}
