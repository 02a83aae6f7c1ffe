import type { BoundingExtrema, ItemAdapter } from "../../types";
import { createExtrema, maxRange, ORIGIN } from "../../geometry/point";
import type { ViewerConfig } from "../types/camera";

export const EMPTY_EXTREMA: BoundingExtrema = Object.freeze({
  mins: ORIGIN,
  maxs: ORIGIN,
  mids: ORIGIN,
});

export function computeExtrema<T>(items: readonly T[], adapter: ItemAdapter<T>): BoundingExtrema {
  if (items.length === 0) return EMPTY_EXTREMA;
  return createExtrema(adapter.getMin(items), adapter.getMax(items));
}

export type BaseScaleConfig = Pick<ViewerConfig, "fitFraction" | "degenerateRangeEpsilon" | "degenerateBaseScale">;

/**
 * Auto-fit factor: the largest extent of the box spans `fitFraction` of the
 * shorter viewport side.
 */
export function computeBaseScale(
  extrema: BoundingExtrema,
  hasData: boolean,
  viewportWidth: number,
  viewportHeight: number,
  config: BaseScaleConfig,
): number {
  if (viewportWidth === 0 || viewportHeight === 0 || !hasData) {
    return 1.0;
  }
  const range = maxRange(extrema);
  if (range < config.degenerateRangeEpsilon) {
    return config.degenerateBaseScale;
  }
  return (Math.min(viewportWidth, viewportHeight) * config.fitFraction) / range;
}
