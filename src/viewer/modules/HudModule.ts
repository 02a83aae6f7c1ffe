import type { RenderContext, ViewerLayer } from "../types/contracts";
import type { CameraState, ViewerConfig } from "../types/camera";
import { formatFixed1, formatFixed2 } from "../format/numbers";
import * as THREE from "three";

export function hudLines(camera: Readonly<CameraState>, viewerDistance: number): string[] {
  const pitch = THREE.MathUtils.radToDeg(camera.rotationX);
  const yaw = THREE.MathUtils.radToDeg(camera.rotationY);
  const mode = camera.perspective ? "Perspective" : "Orthographic";
  return [
    `Rotation (Pitch/Yaw): ${formatFixed1(pitch)}°, ${formatFixed1(yaw)}°`,
    `Zoom: ${formatFixed2(camera.userZoom)}x`,
    `Projection: ${mode} (D=${formatFixed1(viewerDistance)})`,
  ];
}

export class HudModule implements ViewerLayer {
  readonly id = "hud";
  readonly renderOrder = 300;

  private readonly config: ViewerConfig;
  private readonly getCameraState: () => Readonly<CameraState>;

  private visible = true;

  constructor(opts: { config: ViewerConfig; getCameraState: () => Readonly<CameraState> }) {
    this.config = opts.config;
    this.getCameraState = opts.getCameraState;
  }

  setVisible(visible: boolean): void {
    this.visible = visible;
  }

  render(ctx: RenderContext): void {
    if (!this.visible) return;
    const { surface } = ctx;
    surface.setColor(this.config.textColor);
    surface.setFont(this.config.hudFont);
    hudLines(this.getCameraState(), this.config.viewerDistance).forEach((line, i) => {
      surface.drawText(line, 10, 20 + i * 20);
    });
    surface.setFont(this.config.controlsFont);
    surface.drawText(this.config.controlsMessage, 10, ctx.viewportHeight - 10);
  }
}
