/**
 * HistoryDecoder - Validates a gateway `/history` body and builds typed records
 *
 * Decoding is all-or-nothing: the first missing or mistyped field, or the
 * first payload that is not strict hex, fails the whole response with a
 * single DecodeError. No partial record list is ever returned.
 *
 * Expected body:
 * ```json
 * { "data": {
 *     "timestamp": 100,
 *     "gw_mac": "AA:BB:CC:DD:EE:FF",
 *     "coordinates": "",
 *     "tags": { "11:22:33:44:55:66": { "rssi": -70, "timestamp": 95, "data": "0201060303aafe" } }
 * } }
 * ```
 */

import { z } from 'zod';
import { HistoryDecoderErrorId } from '../constants/errorIds';
import { GatewayErrorKind, GatewayResult } from './ErrorTypes';
import { failure, success } from './GatewayErrors';
import { normalizeIdentifier } from './MacAddress';
import type { BeaconRecord, HistoryResponse } from './types';

const INTEGER_STRING = /^\s*-?\d+\s*$/;
const HEX_PAYLOAD = /^(?:[0-9a-fA-F]{2})+$/;

/**
 * Finite number or integer string, truncated toward zero.
 */
const IntegerField = z
  .union([z.number().finite(), z.string().regex(INTEGER_STRING, 'expected an integer')], {
    errorMap: (_issue, ctx) => ({
      message: ctx.data === undefined ? 'Required' : 'expected an integer',
    }),
  })
  .transform((value) => Math.trunc(Number(value)));

const HexPayload = z
  .string({ required_error: 'Required', invalid_type_error: 'expected a hex string' })
  .regex(HEX_PAYLOAD, 'expected a non-empty hex string')
  .transform((hex) => new Uint8Array(Buffer.from(hex, 'hex')));

const TagSchema = z.object({
  rssi: IntegerField,
  timestamp: IntegerField,
  data: HexPayload,
});

const HistoryEnvelopeSchema = z.object({
  data: z.object({
    timestamp: IntegerField,
    gw_mac: z.string({ required_error: 'Required' }).min(1, 'expected a non-empty string'),
    coordinates: z.string().nullish(),
    tags: z.record(z.string(), TagSchema).nullish(),
  }),
});

/**
 * Decodes a parsed JSON body into a `HistoryResponse`.
 *
 * A response timestamp of `0` means the gateway clock is not set, so
 * `ageSeconds` is left absent on every record.
 *
 * @param body - Parsed JSON value from the gateway
 * @returns The decoded response, or a DecodeError failure
 */
export function decodeHistory(body: unknown): GatewayResult<HistoryResponse> {
  const parsed = HistoryEnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return decodeFailure(issue.path, issue.message, classifyIssue(issue));
  }

  const { timestamp, gw_mac, coordinates, tags } = parsed.data.data;
  const records: BeaconRecord[] = [];
  const seen = new Set<string>();

  for (const [key, tag] of Object.entries(tags ?? {})) {
    const identifier = normalizeIdentifier(key);
    if (identifier === '') {
      return decodeFailure(['data', 'tags', key], 'expected a non-empty identifier', HistoryDecoderErrorId.INVALID_TAG);
    }
    if (seen.has(identifier)) {
      return decodeFailure(
        ['data', 'tags', key],
        `duplicate identifier ${identifier}`,
        HistoryDecoderErrorId.DUPLICATE_IDENTIFIER
      );
    }
    seen.add(identifier);

    records.push({
      identifier,
      signalStrength: tag.rssi,
      timestamp: tag.timestamp,
      payload: tag.data,
      ageSeconds: timestamp !== 0 ? timestamp - tag.timestamp : undefined,
    });
  }

  return success({
    timestamp,
    gatewayIdentifier: gw_mac,
    records,
    coordinates: coordinates ?? '',
  });
}

/**
 * Formats a schema path the way it appears in the JSON body,
 * e.g. `data.tags["11:22:33:44:55:66"].data`.
 */
export function formatPath(path: ReadonlyArray<string | number>): string {
  if (path.length === 0) {
    return '<root>';
  }
  return path
    .map((segment, index) => {
      if (typeof segment === 'number') {
        return `[${segment}]`;
      }
      if (index > 0 && path[index - 1] === 'tags') {
        return `[${JSON.stringify(segment)}]`;
      }
      return index === 0 ? segment : `.${segment}`;
    })
    .join('');
}

function classifyIssue(issue: z.ZodIssue): HistoryDecoderErrorId {
  const [root, collection, , field] = issue.path;
  if (root !== 'data' || collection !== 'tags' || issue.path.length < 3) {
    return HistoryDecoderErrorId.INVALID_ENVELOPE;
  }
  if (field === 'data' && issue.code === z.ZodIssueCode.invalid_string) {
    return HistoryDecoderErrorId.INVALID_PAYLOAD_HEX;
  }
  return HistoryDecoderErrorId.INVALID_TAG;
}

function decodeFailure(
  path: ReadonlyArray<string | number>,
  reason: string,
  errorId: HistoryDecoderErrorId
): GatewayResult<HistoryResponse> {
  return failure(
    GatewayErrorKind.DECODE_ERROR,
    `Invalid history payload at ${formatPath(path)}: ${reason}`,
    errorId
  );
}
