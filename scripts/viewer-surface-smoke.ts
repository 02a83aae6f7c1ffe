import * as assert from "node:assert/strict";
import { CanvasSurface, toCssFont, type Canvas2DTarget } from "../src/viewer/surface/CanvasSurface";
import { parseColor, toCssColor } from "../src/viewer/surface/colors";
import { PointCloudViewer } from "../src/viewer/PointCloudViewer";
import { pointRecordAdapter } from "../src/adapters/records";
import type { PointRecord } from "../src/types";

class FakeContext implements Canvas2DTarget {
  readonly calls: string[] = [];
  fillStyle: string | CanvasGradient | CanvasPattern = "";
  strokeStyle: string | CanvasGradient | CanvasPattern = "";
  lineWidth = 1;
  font = "";
  textBaseline: CanvasTextBaseline = "top";

  beginPath(): void {
    this.calls.push("beginPath");
  }
  moveTo(x: number, y: number): void {
    this.calls.push(`moveTo ${x},${y}`);
  }
  lineTo(x: number, y: number): void {
    this.calls.push(`lineTo ${x},${y}`);
  }
  stroke(): void {
    this.calls.push(`stroke ${String(this.strokeStyle)} ${this.lineWidth}`);
  }
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number): void {
    this.calls.push(`arc ${x},${y} r=${radius} ${startAngle}..${endAngle === Math.PI * 2 ? "2pi" : endAngle}`);
  }
  fill(): void {
    this.calls.push(`fill ${String(this.fillStyle)}`);
  }
  fillText(text: string, x: number, y: number): void {
    this.calls.push(`fillText ${text} ${x},${y} ${this.font}`);
  }
  fillRect(x: number, y: number, w: number, h: number): void {
    this.calls.push(`fillRect ${x},${y},${w},${h} ${String(this.fillStyle)}`);
  }
  setTransform(...args: unknown[]): void {
    this.calls.push(`setTransform ${args.join(",")}`);
  }
}

{
  assert.equal(toCssColor({ r: 192, g: 192, b: 192 }), "rgb(192, 192, 192)");
  assert.deepEqual(parseColor("#ff0000"), { r: 255, g: 0, b: 0 });
  assert.deepEqual(parseColor("#336699"), { r: 51, g: 102, b: 153 });
  assert.deepEqual(parseColor("rgb(0, 0, 255)"), { r: 0, g: 0, b: 255 });
  assert.deepEqual(parseColor("white"), { r: 255, g: 255, b: 255 });

  assert.equal(toCssFont({ family: "SansSerif", sizePx: 12, weight: "normal" }), "normal 12px sans-serif");
  assert.equal(toCssFont({ family: "Arial", sizePx: 12, weight: "bold" }), "bold 12px Arial");
}

{
  const ctx = new FakeContext();
  const surface = new CanvasSurface(ctx);
  surface.beginFrame(300, 200, 2, { r: 64, g: 64, b: 64 });
  assert.equal(ctx.textBaseline, "alphabetic");
  const callsBeforeHint = ctx.calls.length;
  surface.setAntialias(false);
  assert.equal(ctx.calls.length, callsBeforeHint, "The antialias hint does not touch the context");
  surface.setColor({ r: 10, g: 20, b: 30 });
  surface.setStrokeWidth(1.5);
  surface.setFont({ family: "SansSerif", sizePx: 12, weight: "normal" });
  surface.drawLine(1, 2, 3, 4);
  surface.fillCircle(10, 20, 6);
  surface.drawText("hi", 5, 6);

  assert.deepEqual(ctx.calls, [
    "setTransform 2,0,0,2,0,0",
    "fillRect 0,0,300,200 rgb(64, 64, 64)",
    "beginPath",
    "moveTo 1,2",
    "lineTo 3,4",
    "stroke rgb(10, 20, 30) 1.5",
    "beginPath",
    "arc 10,20 r=3 0..2pi",
    "fill rgb(10, 20, 30)",
    "fillText hi 5,6 normal 12px sans-serif",
  ]);
}

{
  // A whole frame through the canvas surface.
  const ctx = new FakeContext();
  const viewer = new PointCloudViewer<PointRecord>({
    width: 200,
    height: 100,
    items: [{ x: 0, y: 0, z: 0, color: "#00ff00", label: "only" }],
    adapter: pointRecordAdapter,
  });
  viewer.render(new CanvasSurface(ctx));
  assert.ok(ctx.calls.includes("arc 100,50 r=3 0..2pi"), "Single point sits at the viewport center");
  assert.ok(ctx.calls.includes("fill rgb(0, 255, 0)"));
  assert.ok(ctx.calls.includes("fillText only 106,44 normal 12px sans-serif"));
  assert.ok(ctx.calls.includes("fillText Zoom: 1.00x 10,40 normal 12px sans-serif"));
}

console.log("viewer surface smoke: ok");
