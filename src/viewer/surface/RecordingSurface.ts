import type { RGBColor } from "../../types";
import type { DrawingSurface } from "../types/contracts";
import type { FontSpec } from "../types/camera";

export type DrawCommand =
  | { op: "antialias"; enabled: boolean }
  | { op: "color"; color: RGBColor }
  | { op: "strokeWidth"; width: number }
  | { op: "font"; font: FontSpec }
  | { op: "line"; x1: number; y1: number; x2: number; y2: number }
  | { op: "circle"; x: number; y: number; diameter: number; color: RGBColor }
  | { op: "text"; text: string; x: number; y: number; color: RGBColor };

/**
 * Headless surface that keeps every primitive it receives. Shapes and text
 * carry the color that was current when they were issued.
 */
export class RecordingSurface implements DrawingSurface {
  readonly commands: DrawCommand[] = [];
  private color: RGBColor = { r: 0, g: 0, b: 0 };

  clear(): void {
    this.commands.length = 0;
  }

  setAntialias(enabled: boolean): void {
    this.commands.push({ op: "antialias", enabled });
  }

  setColor(color: RGBColor): void {
    this.color = color;
    this.commands.push({ op: "color", color });
  }

  setStrokeWidth(width: number): void {
    this.commands.push({ op: "strokeWidth", width });
  }

  setFont(font: FontSpec): void {
    this.commands.push({ op: "font", font });
  }

  drawLine(x1: number, y1: number, x2: number, y2: number): void {
    this.commands.push({ op: "line", x1, y1, x2, y2 });
  }

  fillCircle(centerX: number, centerY: number, diameter: number): void {
    this.commands.push({ op: "circle", x: centerX, y: centerY, diameter, color: this.color });
  }

  drawText(text: string, x: number, y: number): void {
    this.commands.push({ op: "text", text, x, y, color: this.color });
  }

  texts(): string[] {
    const out: string[] = [];
    for (const c of this.commands) {
      if (c.op === "text") out.push(c.text);
    }
    return out;
  }

  circles(): Array<Extract<DrawCommand, { op: "circle" }>> {
    return this.commands.filter((c): c is Extract<DrawCommand, { op: "circle" }> => c.op === "circle");
  }

  lines(): Array<Extract<DrawCommand, { op: "line" }>> {
    return this.commands.filter((c): c is Extract<DrawCommand, { op: "line" }> => c.op === "line");
  }
}
