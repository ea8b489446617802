const TIE_PATTERN = /^50*$/;

/**
 * Rounds to `digits` decimal places, sending exact halves to the even neighbour
 * (0.25 -> 0.2, 0.125 -> 0.12, 2.5 -> 2). Other values round to the nearest.
 */
export function roundHalfEven(value: number, digits = 0): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return value;
  }

  const [whole, fraction = ''] = Math.abs(value).toFixed(100).split('.');
  if (TIE_PATTERN.test(fraction.slice(digits))) {
    const kept = `${whole}.${fraction.slice(0, digits)}`;
    const lastDigit = Number(kept.charAt(digits > 0 ? kept.length - 1 : whole.length - 1));
    if (lastDigit % 2 === 0) {
      const truncated = Number(kept);
      return value < 0 ? -truncated : truncated;
    }
  }
  // toFixed picks the nearest value and moves halves away from zero.
  return Number(value.toFixed(digits));
}
