import * as THREE from "three";
import type { ItemAdapter } from "../../types";
import type { ProjectedPoint, ViewerConfig } from "../types/camera";
import type { Projector } from "../projection/project";

export type DotSizeConfig = Pick<ViewerConfig, "baseDotSize" | "minDotSize" | "maxDotSize">;

export function dotSize(perspectiveFactor: number, config: DotSizeConfig): number {
  return THREE.MathUtils.clamp(
    Math.trunc(config.baseDotSize * perspectiveFactor),
    config.minDotSize,
    config.maxDotSize,
  );
}

function normalizeLabel(label: string | null | undefined): string | null {
  if (label === null || label === undefined) return null;
  return label.trim().length > 0 ? label : null;
}

/**
 * Projects every item; items behind the camera are left out of the frame.
 * The result is in dataset order, see `sortByDepth`.
 */
export function projectItems<T>(
  items: readonly T[],
  adapter: ItemAdapter<T>,
  project: Projector,
  config: DotSizeConfig,
): ProjectedPoint[] {
  const out: ProjectedPoint[] = [];
  for (let i = 0; i < items.length; i++) {
    const sr = project(adapter.getItem(items, i));
    if (!sr) continue;
    out.push({
      screenX: sr.x,
      screenY: sr.y,
      depth: sr.depth,
      size: dotSize(sr.perspectiveFactor, config),
      color: adapter.getColor(items, i),
      label: normalizeLabel(adapter.getLabel(items, i)),
      index: i,
    });
  }
  return out;
}

// Painter's order: ascending depth, stable for equal depths.
export function sortByDepth(points: ProjectedPoint[]): ProjectedPoint[] {
  return points.sort((a, b) => a.depth - b.depth);
}

export function buildScene<T>(
  items: readonly T[],
  adapter: ItemAdapter<T>,
  project: Projector,
  config: DotSizeConfig,
): ProjectedPoint[] {
  return sortByDepth(projectItems(items, adapter, project, config));
}

/**
 * Topmost point whose dot, padded by `slopPx`, contains (x, y).
 * Later entries are drawn over earlier ones, so the scan runs back to front.
 */
export function pickProjected(
  points: readonly ProjectedPoint[],
  x: number,
  y: number,
  slopPx = 3,
): ProjectedPoint | null {
  for (let i = points.length - 1; i >= 0; i--) {
    const p = points[i];
    const radius = p.size / 2 + slopPx;
    if (Math.hypot(p.screenX - x, p.screenY - y) <= radius) {
      return p;
    }
  }
  return null;
}
