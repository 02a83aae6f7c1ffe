import type { BoundingExtrema, Point3D } from "../../types";
import type { CameraState, ScreenResult, ViewerConfig, ViewportCenter } from "../types/camera";

export type ProjectionConfig = Pick<ViewerConfig, "viewerDistance" | "nearEpsilon">;

export function effectiveScale(camera: Pick<CameraState, "baseScale" | "userZoom">): number {
  return camera.baseScale * camera.userZoom;
}

export function viewportCenter(viewportWidth: number, viewportHeight: number): ViewportCenter {
  return { x: Math.trunc(viewportWidth / 2), y: Math.trunc(viewportHeight / 2) };
}

/**
 * Rotates around X by `rotationX`, then around Y by `rotationY`, and maps the
 * result onto the screen. Screen Y grows downward while model Y grows upward.
 *
 * Returns `null` in perspective mode when the point sits at or behind the
 * near limit (`viewerDistance - nearEpsilon`).
 */
export function projectPoint(
  x: number,
  y: number,
  z: number,
  camera: Readonly<CameraState>,
  center: ViewportCenter,
  config: ProjectionConfig,
): ScreenResult | null {
  const cosX = Math.cos(camera.rotationX);
  const sinX = Math.sin(camera.rotationX);
  const cosY = Math.cos(camera.rotationY);
  const sinY = Math.sin(camera.rotationY);

  const y1 = y * cosX - z * sinX;
  const z1 = y * sinX + z * cosX;
  const x2 = x * cosY + z1 * sinY;
  const y2 = y1;
  const z2 = z1 * cosY - x * sinY;

  let factor = 1.0;
  if (camera.perspective) {
    if (config.viewerDistance - z2 > config.nearEpsilon) {
      factor = config.viewerDistance / (config.viewerDistance - z2);
    } else {
      return null;
    }
  }

  const scale = effectiveScale(camera);
  return {
    x: Math.trunc(center.x + x2 * scale * factor),
    y: Math.trunc(center.y - y2 * scale * factor),
    depth: z2,
    perspectiveFactor: factor,
  };
}

export type Projector = (point: Point3D) => ScreenResult | null;

/** Projects model-space points relative to the box midpoint. */
export function createProjector(
  camera: Readonly<CameraState>,
  extrema: BoundingExtrema,
  viewportWidth: number,
  viewportHeight: number,
  config: ProjectionConfig,
): Projector {
  const center = viewportCenter(viewportWidth, viewportHeight);
  const { mids } = extrema;
  return (p) => projectPoint(p.x - mids.x, p.y - mids.y, p.z - mids.z, camera, center, config);
}
