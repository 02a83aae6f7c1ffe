import * as THREE from "three";
import type { RGBColor } from "../../types";

export function toCssColor(color: RGBColor): string {
  return `rgb(${color.r}, ${color.g}, ${color.b})`;
}

/** Accepts anything three's `Color` parses: hex, `rgb()`, `hsl()`, CSS names. */
export function parseColor(style: string): RGBColor {
  const hex = new THREE.Color(style).getHex();
  return { r: (hex >> 16) & 0xff, g: (hex >> 8) & 0xff, b: hex & 0xff };
}
