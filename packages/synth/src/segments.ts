/** Number of high-order bits that select a domain segment. */
export const DOMAIN_BITS = 2;

export const DOMAIN_COUNT = 1 << DOMAIN_BITS;

const DOMAIN_MASK = BigInt(DOMAIN_COUNT - 1);

/** Right shift that leaves the top `DOMAIN_BITS` bits of a `bitWidth`-bit value. */
export function domainShift(bitWidth: number): number {
  return Math.max(0, bitWidth - DOMAIN_BITS);
}

export function domainOf(value: bigint, shift: number): number {
  return Number((value >> BigInt(shift)) & DOMAIN_MASK);
}
