import type { RenderContext, ViewerLayer } from "../types/contracts";
import type { CameraState, ProjectedPoint, ViewerConfig } from "../types/camera";
import type { SceneData } from "../scene/SceneData";
import { buildScene } from "../scene/buildScene";
import { createProjector } from "../projection/project";

export class PointsModule<T> implements ViewerLayer {
  readonly id = "points";
  readonly renderOrder = 200;

  private readonly config: ViewerConfig;
  private readonly scene: SceneData<T>;
  private readonly getCameraState: () => Readonly<CameraState>;

  private labelsVisible = true;

  constructor(opts: {
    config: ViewerConfig;
    scene: SceneData<T>;
    getCameraState: () => Readonly<CameraState>;
  }) {
    this.config = opts.config;
    this.scene = opts.scene;
    this.getCameraState = opts.getCameraState;
  }

  setLabelsVisible(visible: boolean): void {
    this.labelsVisible = visible;
  }

  /** Depth-sorted primitives for a viewport; empty when there is no data. */
  project(viewportWidth: number, viewportHeight: number): ProjectedPoint[] {
    const adapter = this.scene.getAdapter();
    if (!adapter || this.scene.isEmpty()) return [];
    const project = createProjector(
      this.getCameraState(),
      this.scene.getExtrema(),
      viewportWidth,
      viewportHeight,
      this.config,
    );
    return buildScene(this.scene.getItems(), adapter, project, this.config);
  }

  render(ctx: RenderContext): boolean {
    const { surface } = ctx;
    if (this.scene.isEmpty()) {
      surface.setColor(this.config.textColor);
      surface.drawText(
        this.config.emptyMessage,
        Math.trunc(ctx.viewportWidth / 2) - 50,
        Math.trunc(ctx.viewportHeight / 2),
      );
      return false;
    }

    surface.setFont(this.config.labelFont);
    for (const p of this.project(ctx.viewportWidth, ctx.viewportHeight)) {
      surface.setColor(p.color);
      surface.fillCircle(p.screenX, p.screenY, p.size);
      if (this.labelsVisible && p.label !== null) {
        surface.drawText(p.label, p.screenX + p.size, p.screenY - p.size);
      }
    }
    return true;
  }
}
