import { DEFAULT_VIEWER_CONFIG } from "../config/defaults";
import type { CameraState, DragInput, ViewerConfig, WheelInput } from "../types/camera";

type CameraConfig = Pick<
  ViewerConfig,
  "rotationSensitivity" | "zoomStep" | "minZoom" | "initialRotationX" | "initialRotationY"
>;

export class CameraController {
  private readonly config: CameraConfig;
  private readonly state: CameraState;

  constructor(initial?: Partial<CameraState>, config?: Partial<CameraConfig>) {
    this.config = { ...DEFAULT_VIEWER_CONFIG, ...config };
    this.state = {
      rotationX: initial?.rotationX ?? this.config.initialRotationX,
      rotationY: initial?.rotationY ?? this.config.initialRotationY,
      baseScale: initial?.baseScale ?? 1.0,
      userZoom: Math.max(this.config.minZoom, initial?.userZoom ?? 1.0),
      perspective: initial?.perspective ?? false,
    };
  }

  // Angles are left unbounded; trig wraps them.
  applyDrag(input: DragInput): void {
    this.state.rotationY += input.deltaX * this.config.rotationSensitivity;
    this.state.rotationX += input.deltaY * this.config.rotationSensitivity;
  }

  applyWheel(input: WheelInput): void {
    this.state.userZoom *= 1.0 - input.notches * this.config.zoomStep;
    this.state.userZoom = Math.max(this.config.minZoom, this.state.userZoom);
  }

  togglePerspective(): boolean {
    this.state.perspective = !this.state.perspective;
    return this.state.perspective;
  }

  setRotation(rotationX: number, rotationY: number): void {
    this.state.rotationX = rotationX;
    this.state.rotationY = rotationY;
  }

  setZoom(userZoom: number): void {
    this.state.userZoom = Number.isFinite(userZoom) ? Math.max(this.config.minZoom, userZoom) : 1.0;
  }

  setBaseScale(baseScale: number): void {
    this.state.baseScale = baseScale;
  }

  reset(): void {
    this.state.rotationX = this.config.initialRotationX;
    this.state.rotationY = this.config.initialRotationY;
    this.state.userZoom = 1.0;
  }

  getState(): Readonly<CameraState> {
    return this.state;
  }
}
