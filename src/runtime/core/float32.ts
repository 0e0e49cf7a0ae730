/**
 * Single Precision Rounding
 *
 * Rounds decimal text to the nearest float32 in one step. Going through a
 * double first is only wrong when the double lands exactly on the midpoint
 * between two float32 values, so that case is settled against the text.
 */

const view = new DataView(new ArrayBuffer(8));

/** Adjacent float32 above (or below) a non-negative float32 */
function adjacentFloat32(value: number, up: boolean): number {
  view.setFloat32(0, value);
  const bits = view.getUint32(0);
  view.setUint32(0, up ? bits + 1 : bits - 1);
  return view.getFloat32(0);
}

/** Split a finite non-negative double into mantissa * 2^exponent */
function decomposeDouble(value: number): { mantissa: bigint; exponent: number } {
  view.setFloat64(0, value);
  const bits = view.getBigUint64(0);
  const biased = Number((bits >> 52n) & 0x7ffn);
  const fraction = bits & 0xf_ffff_ffff_ffffn;
  if (biased === 0) return { mantissa: fraction, exponent: -1074 };
  return { mantissa: fraction | 0x10_0000_0000_0000n, exponent: biased - 1075 };
}

const DECIMAL_PARTS = /^[+-]?([0-9]*)(?:\.([0-9]*))?(?:e([+-]?[0-9]+))?$/i;

/** Compare the magnitude of decimal text with a non-negative double, exactly */
function compareDecimal(text: string, value: number): -1 | 0 | 1 {
  const match = DECIMAL_PARTS.exec(text);
  const whole = match?.[1] ?? '';
  const fraction = match?.[2] ?? '';
  const decimalExponent = Number(match?.[3] ?? '0') - fraction.length;
  const { mantissa, exponent } = decomposeDouble(value);

  let left = BigInt(whole + fraction || '0');
  let right = mantissa;
  if (decimalExponent >= 0) left *= 10n ** BigInt(decimalExponent);
  else right *= 10n ** BigInt(-decimalExponent);
  if (exponent >= 0) right <<= BigInt(exponent);
  else left <<= BigInt(-exponent);

  if (left < right) return -1;
  return left > right ? 1 : 0;
}

/**
 * Round `text`, a decimal literal already parsed to `double`, to float32.
 * Ties go to even, as Math.fround does.
 */
export function roundToFloat32(text: string, double: number): number {
  const rounded = Math.fround(double);
  if (rounded === double || !Number.isFinite(double)) return rounded;

  const magnitude = Math.abs(double);
  const nearest = Math.abs(rounded);
  const other = adjacentFloat32(nearest, magnitude > nearest);
  const lower = Math.min(nearest, other);
  const upper = Math.max(nearest, other);
  // Past the largest float32 the next step is 2^128
  const upperBound = upper === Infinity ? 2 ** 128 : upper;
  if ((lower + upperBound) / 2 !== magnitude) return rounded;

  const ordering = compareDecimal(text, magnitude);
  if (ordering === 0) return rounded;
  const chosen = ordering > 0 ? upper : lower;
  return double < 0 ? -chosen : chosen;
}
