/**
 * Hardware address helpers used for beacon identifiers and gateway identity.
 */

const HEX_DIGITS = /^[0-9a-f]{12}$/;

/**
 * Normalizes a beacon identifier for comparison: trimmed and upper-cased.
 */
export function normalizeIdentifier(identifier: string): string {
  return identifier.trim().toUpperCase();
}

/**
 * Formats a MAC address as lower-case, colon separated pairs.
 *
 * Accepts colon, dash or dot separated forms and bare 12-digit hex. Anything
 * else is returned unchanged apart from trimming.
 *
 * @example
 * ```typescript
 * formatMac('AA-BB-CC-DD-EE-FF'); // 'aa:bb:cc:dd:ee:ff'
 * formatMac('aabb.ccdd.eeff');    // 'aa:bb:cc:dd:ee:ff'
 * ```
 */
export function formatMac(mac: string): string {
  const trimmed = mac.trim();
  const digits = trimmed.toLowerCase().replace(/[:\-.]/g, '');
  if (!HEX_DIGITS.test(digits)) {
    return trimmed;
  }
  return digits.match(/../g)?.join(':') ?? trimmed;
}

/**
 * Last five characters of the gateway identifier, upper-cased.
 * Used for labels only.
 */
export function getGatewayIdentifierSuffix(gatewayIdentifier: string): string {
  return gatewayIdentifier.slice(-5).toUpperCase();
}

/**
 * Builds the display title for a gateway.
 */
export function buildGatewayTitle(gatewayIdentifier: string): string {
  return `Beacon Gateway ${getGatewayIdentifierSuffix(gatewayIdentifier)}`;
}
