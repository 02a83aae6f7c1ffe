import * as d3 from "d3";
import type { Point3D } from "../../types";

// ASCII minus so labels render in fonts without U+2212.
const locale = d3.formatLocale({
  decimal: ".",
  thousands: ",",
  grouping: [3],
  currency: ["", ""],
  minus: "-",
});

const coordinate = locale.format(",.1f");
const fixed1 = locale.format(".1f");
const fixed2 = locale.format(".2f");

/**
 * Moves exact one-decimal ties to the even tenth. The only doubles sitting
 * exactly on such a tie are odd multiples of 0.25, so everything else is
 * left for d3 to round.
 */
function roundTiesToEvenTenth(value: number): number {
  const magnitude = Math.abs(value);
  const quarters = magnitude * 4;
  if (!Number.isInteger(quarters) || quarters % 2 === 0) return value;
  const lower = Math.floor(magnitude * 10);
  const tenths = lower % 2 === 0 ? lower : lower + 1;
  return Math.sign(value) * (tenths / 10);
}

// d3 drops the minus once a negative value rounds to zero.
function keepNegativeSign(value: number, text: string): string {
  const negative = value < 0 || Object.is(value, -0);
  return negative && !text.startsWith("-") ? `-${text}` : text;
}

/** `1234.56` → `"1,234.6"`, `2.25` → `"2.2"`, `-0.04` → `"-0.0"` */
export function formatCoordinate(value: number): string {
  return keepNegativeSign(value, coordinate(roundTiesToEvenTenth(value)));
}

export function formatTuple(p: Point3D): string {
  return `(${formatCoordinate(p.x)}, ${formatCoordinate(p.y)}, ${formatCoordinate(p.z)})`;
}

// HUD values round ties away from zero.
export function formatFixed1(value: number): string {
  return keepNegativeSign(value, fixed1(value));
}

export function formatFixed2(value: number): string {
  return keepNegativeSign(value, fixed2(value));
}
