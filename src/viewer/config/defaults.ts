import type { ViewerConfig } from "../types/camera";

export const DEFAULT_VIEWER_CONFIG: ViewerConfig = {
  viewerDistance: 30.0,
  nearEpsilon: 0.1,
  rotationSensitivity: 0.01,
  zoomStep: 0.1,
  minZoom: 0.1,
  fitFraction: 0.8,
  degenerateRangeEpsilon: 1e-9,
  degenerateBaseScale: 50.0,
  baseDotSize: 6,
  minDotSize: 2,
  maxDotSize: 15,
  initialRotationX: Math.PI / 6,
  initialRotationY: Math.PI / 4,
  backgroundColor: { r: 64, g: 64, b: 64 },
  axisColor: { r: 192, g: 192, b: 192 },
  textColor: { r: 255, g: 255, b: 255 },
  axisStrokeWidth: 1.5,
  axisFont: { family: "SansSerif", sizePx: 12, weight: "normal" },
  labelFont: { family: "SansSerif", sizePx: 12, weight: "normal" },
  hudFont: { family: "SansSerif", sizePx: 12, weight: "normal" },
  controlsFont: { family: "Arial", sizePx: 12, weight: "bold" },
  emptyMessage: "No data to display.",
  controlsMessage: "Controls: Drag mouse (LMB) to rotate, use mouse wheel to zoom.",
};

export const DEFAULT_POINT_COLOR = { r: 80, g: 170, b: 255 } as const;

export const DEFAULT_PIPELINE_CONFIG = {
  strictLayerErrors: true,
};

export const DEFAULT_INPUT_CONFIG = {
  tapMoveThresholdPx: 6,
  wheelPixelsPerNotch: 120,
  wheelLinesPerNotch: 3,
  minPinchRatio: 0.78,
  maxPinchRatio: 1.28,
};
