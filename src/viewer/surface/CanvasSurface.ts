import type { RGBColor } from "../../types";
import type { DrawingSurface } from "../types/contracts";
import type { FontSpec } from "../types/camera";
import { toCssColor } from "./colors";

export type Canvas2DTarget = Pick<
  CanvasRenderingContext2D,
  | "fillStyle"
  | "strokeStyle"
  | "lineWidth"
  | "font"
  | "textBaseline"
  | "beginPath"
  | "moveTo"
  | "lineTo"
  | "stroke"
  | "arc"
  | "fill"
  | "fillText"
  | "fillRect"
  | "setTransform"
>;

const GENERIC_FAMILIES: Record<string, string> = {
  SansSerif: "sans-serif",
  Serif: "serif",
  Monospaced: "monospace",
  Dialog: "sans-serif",
};

export function toCssFont(font: FontSpec): string {
  const family = GENERIC_FAMILIES[font.family] ?? font.family;
  return `${font.weight} ${font.sizePx}px ${family}`;
}

export class CanvasSurface implements DrawingSurface {
  private readonly ctx: Canvas2DTarget;

  constructor(ctx: Canvas2DTarget) {
    this.ctx = ctx;
  }

  /** Resets the transform to `pixelRatio` and paints the background. */
  beginFrame(width: number, height: number, pixelRatio: number, background: RGBColor): void {
    this.ctx.setTransform(pixelRatio, 0, 0, pixelRatio, 0, 0);
    this.ctx.fillStyle = toCssColor(background);
    this.ctx.fillRect(0, 0, width, height);
    this.ctx.textBaseline = "alphabetic";
  }

  /** No-op: a 2D canvas always antialiases lines, arcs and text. */
  setAntialias(_enabled: boolean): void {}

  setColor(color: RGBColor): void {
    const css = toCssColor(color);
    this.ctx.fillStyle = css;
    this.ctx.strokeStyle = css;
  }

  setStrokeWidth(width: number): void {
    this.ctx.lineWidth = width;
  }

  setFont(font: FontSpec): void {
    this.ctx.font = toCssFont(font);
  }

  drawLine(x1: number, y1: number, x2: number, y2: number): void {
    this.ctx.beginPath();
    this.ctx.moveTo(x1, y1);
    this.ctx.lineTo(x2, y2);
    this.ctx.stroke();
  }

  fillCircle(centerX: number, centerY: number, diameter: number): void {
    this.ctx.beginPath();
    this.ctx.arc(centerX, centerY, diameter / 2, 0, Math.PI * 2);
    this.ctx.fill();
  }

  drawText(text: string, x: number, y: number): void {
    this.ctx.fillText(text, x, y);
  }
}
