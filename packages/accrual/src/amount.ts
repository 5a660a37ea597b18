/**
 * Wire amounts. Engine quantities are bigint; JSON and CBOR carry them as
 * unsigned decimal strings so nothing is lost above 2^53.
 */

const DECIMAL = /^(0|[1-9][0-9]*)$/;

export function isAmount(value: string): boolean {
  return DECIMAL.test(value);
}

/** @throws RangeError on anything but an unsigned decimal integer string */
export function parseAmount(value: string): bigint {
  if (!DECIMAL.test(value)) {
    throw new RangeError(`invalid amount: ${JSON.stringify(value)}`);
  }
  return BigInt(value);
}

export function formatAmount(value: bigint): string {
  return value.toString(10);
}
