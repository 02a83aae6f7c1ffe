export { PointCloudViewer } from "./PointCloudViewer";
export type { PointCloudViewerOptions, PickResult } from "./PointCloudViewer";
export { createPointCloudViewer } from "./createPointCloudViewer";
export type { CreatePointCloudViewerOptions, PointCloudViewerHandle } from "./createPointCloudViewer";

export { RenderPipeline, NOOP_LOGGER } from "./core/RenderPipeline";
export { LayerScheduler } from "./core/LayerScheduler";
export { CameraController } from "./camera/CameraController";
export { SceneData } from "./scene/SceneData";
export { computeBaseScale, computeExtrema, EMPTY_EXTREMA } from "./scene/extrema";
export { buildScene, dotSize, pickProjected, projectItems, sortByDepth } from "./scene/buildScene";
export { createProjector, effectiveScale, projectPoint, viewportCenter } from "./projection/project";
export { AxesModule, adjacentCorner, findFarCorner } from "./modules/AxesModule";
export { PointsModule } from "./modules/PointsModule";
export { HudModule, hudLines } from "./modules/HudModule";
export { InputNormalizer } from "./input/InputNormalizer";
export { InputReplayPlayer, replay } from "./parity/InputReplay";
export { CanvasSurface, toCssFont } from "./surface/CanvasSurface";
export { RecordingSurface } from "./surface/RecordingSurface";
export { parseColor, toCssColor } from "./surface/colors";
export { formatCoordinate, formatTuple } from "./format/numbers";
export { DEFAULT_VIEWER_CONFIG } from "./config/defaults";

export type { DrawingSurface, Logger, RenderContext, ViewerLayer, ViewerMetrics } from "./types/contracts";
export type {
  CameraState,
  FontSpec,
  ProjectedPoint,
  ScreenResult,
  ViewerConfig,
  ViewportCenter,
} from "./types/camera";
export type { ViewerInputEvent, InputPointerType } from "./input/InputEventTypes";
export type { PointerSample, InputNormalizerOptions } from "./input/InputNormalizer";
export type { InputReplayScript, InputReplayFrame, ReplayOutcome, ReplayTarget } from "./parity/InputReplay";
export type { DrawCommand } from "./surface/RecordingSurface";
export type { Canvas2DTarget } from "./surface/CanvasSurface";
