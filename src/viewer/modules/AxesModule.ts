import type { BoundingExtrema, Point3D } from "../../types";
import { boxCorners } from "../../geometry/point";
import type { RenderContext, ViewerLayer } from "../types/contracts";
import type { CameraState, ScreenResult, ViewerConfig } from "../types/camera";
import { createProjector, type Projector } from "../projection/project";
import { formatCoordinate, formatTuple } from "../format/numbers";

type Axis = "x" | "y" | "z";

type AxisLabelOffsets = {
  value: readonly [number, number];
  name: readonly [number, number];
};

const AXES: ReadonlyArray<{ axis: Axis; name: string; offsets: AxisLabelOffsets }> = [
  { axis: "x", name: "X", offsets: { value: [-8, 15], name: [-4, -8] } },
  { axis: "y", name: "Y", offsets: { value: [-8, 15], name: [8, 4] } },
  { axis: "z", name: "Z", offsets: { value: [-8, 15], name: [-4, -8] } },
];

const ORIGIN_LABEL_OFFSET = [-20, 15] as const;

export interface FarCorner {
  corner: Point3D;
  screen: ScreenResult;
}

/**
 * Smallest post-rotation depth is treated as farthest from the viewer.
 * Corners that fail projection are not candidates.
 */
export function findFarCorner(extrema: BoundingExtrema, project: Projector): FarCorner | null {
  let best: FarCorner | null = null;
  for (const corner of boxCorners(extrema)) {
    const screen = project(corner);
    if (screen && (best === null || screen.depth < best.screen.depth)) {
      best = { corner, screen };
    }
  }
  return best;
}

export function adjacentCorner(far: Point3D, extrema: BoundingExtrema, axis: Axis): Point3D {
  const flipped = far[axis] === extrema.mins[axis] ? extrema.maxs[axis] : extrema.mins[axis];
  return { ...far, [axis]: flipped };
}

export class AxesModule implements ViewerLayer {
  readonly id = "axes";
  readonly renderOrder = 100;

  private readonly config: ViewerConfig;
  private readonly getCameraState: () => Readonly<CameraState>;
  private readonly getExtrema: () => BoundingExtrema;
  private readonly isEmpty: () => boolean;

  private visible = true;

  constructor(opts: {
    config: ViewerConfig;
    getCameraState: () => Readonly<CameraState>;
    getExtrema: () => BoundingExtrema;
    isEmpty: () => boolean;
  }) {
    this.config = opts.config;
    this.getCameraState = opts.getCameraState;
    this.getExtrema = opts.getExtrema;
    this.isEmpty = opts.isEmpty;
  }

  setVisible(visible: boolean): void {
    this.visible = visible;
  }

  render(ctx: RenderContext): void {
    if (!this.visible || this.isEmpty()) return;
    const extrema = this.getExtrema();
    const project = createProjector(
      this.getCameraState(),
      extrema,
      ctx.viewportWidth,
      ctx.viewportHeight,
      this.config,
    );
    const far = findFarCorner(extrema, project);
    if (!far) return;

    const { surface } = ctx;
    surface.setColor(this.config.axisColor);
    surface.setStrokeWidth(this.config.axisStrokeWidth);
    surface.setFont(this.config.axisFont);

    const origin = far.screen;
    surface.drawText(
      formatTuple(far.corner),
      origin.x + ORIGIN_LABEL_OFFSET[0],
      origin.y + ORIGIN_LABEL_OFFSET[1],
    );

    for (const { axis, name, offsets } of AXES) {
      const adjacent = adjacentCorner(far.corner, extrema, axis);
      const edgeMid: Point3D = { ...far.corner, [axis]: (far.corner[axis] + adjacent[axis]) / 2 };
      const end = project(adjacent);
      const mid = project(edgeMid);
      if (!end) continue;

      surface.drawLine(origin.x, origin.y, end.x, end.y);
      surface.drawText(formatCoordinate(adjacent[axis]), end.x + offsets.value[0], end.y + offsets.value[1]);
      if (mid) {
        surface.drawText(name, mid.x + offsets.name[0], mid.y + offsets.name[1]);
      }
    }
  }
}
