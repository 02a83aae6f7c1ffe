import type { RGBColor } from "../../types";

export interface CameraState {
  rotationX: number;
  rotationY: number;
  baseScale: number;
  userZoom: number;
  perspective: boolean;
}

export interface FontSpec {
  family: string;
  sizePx: number;
  weight: "normal" | "bold";
}

export interface ViewerConfig {
  viewerDistance: number;
  nearEpsilon: number;
  rotationSensitivity: number;
  zoomStep: number;
  minZoom: number;
  fitFraction: number;
  degenerateRangeEpsilon: number;
  degenerateBaseScale: number;
  baseDotSize: number;
  minDotSize: number;
  maxDotSize: number;
  initialRotationX: number;
  initialRotationY: number;
  backgroundColor: RGBColor;
  axisColor: RGBColor;
  textColor: RGBColor;
  axisStrokeWidth: number;
  axisFont: FontSpec;
  labelFont: FontSpec;
  hudFont: FontSpec;
  controlsFont: FontSpec;
  emptyMessage: string;
  controlsMessage: string;
}

export interface ViewportCenter {
  x: number;
  y: number;
}

export interface ScreenResult {
  x: number;
  y: number;
  depth: number;
  perspectiveFactor: number;
}

export interface ProjectedPoint {
  screenX: number;
  screenY: number;
  depth: number;
  size: number;
  color: RGBColor;
  label: string | null;
  index: number;
}

export interface DragInput {
  deltaX: number;
  deltaY: number;
}

export interface WheelInput {
  notches: number;
}
