import type { BoundingExtrema, ItemAdapter } from "../types";
import { DEFAULT_VIEWER_CONFIG } from "./config/defaults";
import { CameraController } from "./camera/CameraController";
import { NOOP_LOGGER, RenderPipeline } from "./core/RenderPipeline";
import { SceneData } from "./scene/SceneData";
import { pickProjected } from "./scene/buildScene";
import { AxesModule } from "./modules/AxesModule";
import { PointsModule } from "./modules/PointsModule";
import { HudModule } from "./modules/HudModule";
import type { ViewerInputEvent } from "./input/InputEventTypes";
import type { DrawingSurface, Logger, ViewerLayer, ViewerMetrics } from "./types/contracts";
import type { CameraState, ProjectedPoint, ViewerConfig } from "./types/camera";

export interface PointCloudViewerOptions<T> {
  items?: readonly T[];
  adapter?: ItemAdapter<T>;
  width?: number;
  height?: number;
  camera?: Partial<CameraState>;
  config?: Partial<ViewerConfig>;
  logger?: Logger;
  strictLayerErrors?: boolean;
  /** Called whenever state changed and the host should draw again. */
  requestRedraw?: () => void;
}

export interface PickResult<T> {
  index: number;
  item: T;
  point: ProjectedPoint;
}

/**
 * Owns the dataset, camera and layers of one viewer. Every mutation happens
 * synchronously and ends with a redraw request; `render` draws the current
 * state onto whatever surface the host passes in.
 */
export class PointCloudViewer<T> {
  readonly config: ViewerConfig;
  readonly camera: CameraController;
  readonly pipeline: RenderPipeline;

  private readonly scene: SceneData<T>;
  private readonly axes: AxesModule;
  private readonly points: PointsModule<T>;
  private readonly hud: HudModule;
  private readonly logger: Logger;
  private requestRedrawFn: () => void;

  constructor(options: PointCloudViewerOptions<T> = {}) {
    this.config = { ...DEFAULT_VIEWER_CONFIG, ...options.config };
    this.logger = options.logger ?? NOOP_LOGGER;
    this.requestRedrawFn = options.requestRedraw ?? (() => undefined);
    this.camera = new CameraController(options.camera, this.config);
    this.scene = new SceneData<T>({ config: this.config, logger: this.logger });
    this.pipeline = new RenderPipeline({
      logger: this.logger,
      strictLayerErrors: options.strictLayerErrors,
    });

    const getCameraState = () => this.camera.getState();
    this.axes = new AxesModule({
      config: this.config,
      getCameraState,
      getExtrema: () => this.scene.getExtrema(),
      isEmpty: () => this.scene.isEmpty(),
    });
    this.points = new PointsModule<T>({ config: this.config, scene: this.scene, getCameraState });
    this.hud = new HudModule({ config: this.config, getCameraState });
    this.pipeline.registerLayer(this.axes);
    this.pipeline.registerLayer(this.points);
    this.pipeline.registerLayer(this.hud);
    this.pipeline.init();

    this.scene.resize(options.width ?? 0, options.height ?? 0);
    if (options.adapter) {
      this.scene.setDataset(options.items ?? [], options.adapter);
    }
    this.syncBaseScale();
  }

  setDataset(items: readonly T[], adapter: ItemAdapter<T>): void {
    this.scene.setDataset(items, adapter);
    this.syncBaseScale();
    this.requestRedraw();
  }

  /** Call after mutating the current item list in place. */
  datasetChanged(): void {
    this.scene.datasetChanged();
    this.syncBaseScale();
    this.requestRedraw();
  }

  resize(width: number, height: number): void {
    this.scene.resize(width, height);
    this.syncBaseScale();
    this.requestRedraw();
  }

  togglePerspective(): void {
    this.camera.togglePerspective();
    this.requestRedraw();
  }

  isPerspectiveEnabled(): boolean {
    return this.camera.getState().perspective;
  }

  rotateBy(deltaX: number, deltaY: number): void {
    this.camera.applyDrag({ deltaX, deltaY });
    this.requestRedraw();
  }

  zoomBy(notches: number): void {
    this.camera.applyWheel({ notches });
    this.requestRedraw();
  }

  setRotation(rotationX: number, rotationY: number): void {
    this.camera.setRotation(rotationX, rotationY);
    this.requestRedraw();
  }

  setZoom(userZoom: number): void {
    this.camera.setZoom(userZoom);
    this.requestRedraw();
  }

  resetView(): void {
    this.camera.reset();
    this.requestRedraw();
  }

  setAxesVisible(visible: boolean): void {
    this.axes.setVisible(visible);
    this.requestRedraw();
  }

  setLabelsVisible(visible: boolean): void {
    this.points.setLabelsVisible(visible);
    this.requestRedraw();
  }

  setHudVisible(visible: boolean): void {
    this.hud.setVisible(visible);
    this.requestRedraw();
  }

  setRedrawHandler(handler: () => void): void {
    this.requestRedrawFn = handler;
  }

  /** Applies a normalized input event. Taps return the picked item, if any. */
  applyInput(event: ViewerInputEvent): PickResult<T> | null {
    switch (event.type) {
      case "rotate":
        this.rotateBy(event.deltaX, event.deltaY);
        return null;
      case "zoom":
        this.zoomBy(event.notches);
        return null;
      case "togglePerspective":
        this.togglePerspective();
        return null;
      case "resetView":
        this.resetView();
        return null;
      case "resize":
        this.resize(event.width, event.height);
        return null;
      case "tap":
        return this.pickAt(event.x, event.y);
    }
  }

  registerLayer(layer: ViewerLayer): void {
    this.pipeline.registerLayer(layer);
    this.requestRedraw();
  }

  unregisterLayer(id: string): boolean {
    const removed = this.pipeline.unregisterLayer(id);
    if (removed) this.requestRedraw();
    return removed;
  }

  render(surface: DrawingSurface): void {
    const { width, height } = this.scene.getViewport();
    surface.setAntialias(true);
    this.pipeline.render({ surface, viewportWidth: width, viewportHeight: height });
  }

  /** Depth-sorted primitives for the current state, as the next frame would draw them. */
  projectScene(): ProjectedPoint[] {
    const { width, height } = this.scene.getViewport();
    return this.points.project(width, height);
  }

  pickAt(x: number, y: number): PickResult<T> | null {
    const hit = pickProjected(this.projectScene(), x, y);
    if (!hit) return null;
    return { index: hit.index, item: this.scene.getItems()[hit.index], point: hit };
  }

  getCameraState(): Readonly<CameraState> {
    return this.camera.getState();
  }

  getExtrema(): BoundingExtrema {
    return this.scene.getExtrema();
  }

  getViewport(): { width: number; height: number } {
    return this.scene.getViewport();
  }

  getItemCount(): number {
    return this.scene.size();
  }

  getMetrics(): ViewerMetrics {
    return this.pipeline.getMetrics();
  }

  dispose(): void {
    this.pipeline.dispose();
    this.requestRedrawFn = () => undefined;
  }

  private syncBaseScale(): void {
    this.camera.setBaseScale(this.scene.getBaseScale());
  }

  private requestRedraw(): void {
    this.requestRedrawFn();
  }
}
