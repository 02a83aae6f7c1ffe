import type { RGBColor } from "../../types";
import type { FontSpec } from "./camera";

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * The only primitives the viewer issues. Coordinates are integer pixels with
 * the origin at the top-left corner; text is positioned by its baseline.
 */
export interface DrawingSurface {
  setAntialias(enabled: boolean): void;
  setColor(color: RGBColor): void;
  setStrokeWidth(width: number): void;
  setFont(font: FontSpec): void;
  drawLine(x1: number, y1: number, x2: number, y2: number): void;
  fillCircle(centerX: number, centerY: number, diameter: number): void;
  drawText(text: string, x: number, y: number): void;
}

export interface RenderContext {
  readonly surface: DrawingSurface;
  readonly viewportWidth: number;
  readonly viewportHeight: number;
}

export type LayerPhase = "init" | "render" | "dispose";

export interface ViewerLayer {
  readonly id: string;
  readonly renderOrder: number;
  init?(): void;
  /** Returning `false` ends the frame; later layers are not drawn. */
  render?(ctx: RenderContext): boolean | void;
  dispose?(): void;
}

export interface ViewerMetrics {
  readonly frameIndex: number;
  readonly lastRenderMs: number;
  readonly layerCount: number;
}
