import * as assert from "node:assert/strict";
import { PointCloudViewer } from "../src/viewer/PointCloudViewer";
import { RecordingSurface } from "../src/viewer/surface/RecordingSurface";
import { pointRecordAdapter } from "../src/adapters/records";
import { hudLines } from "../src/viewer/modules/HudModule";
import { DEFAULT_VIEWER_CONFIG } from "../src/viewer/config/defaults";
import type { PointRecord } from "../src/types";

const WHITE = { r: 255, g: 255, b: 255 };
const RED = { r: 255, g: 0, b: 0 };
const BLUE = { r: 0, g: 0, b: 255 };

// Empty viewer: placeholder only, no axes, no HUD.
{
  const viewer = new PointCloudViewer<PointRecord>({ width: 800, height: 600 });
  const surface = new RecordingSurface();
  viewer.render(surface);
  assert.deepEqual(surface.commands, [
    { op: "antialias", enabled: true },
    { op: "color", color: WHITE },
    { op: "text", text: "No data to display.", x: 350, y: 300, color: WHITE },
  ]);

  viewer.setDataset([], pointRecordAdapter);
  surface.clear();
  viewer.render(surface);
  assert.deepEqual(surface.texts(), ["No data to display."]);
  assert.deepEqual(viewer.getExtrema().mids, { x: 0, y: 0, z: 0 });
  assert.equal(viewer.getItemCount(), 0);
}

// Two points, fed back to front so the sort has work to do.
{
  let redraws = 0;
  const near: PointRecord = { x: 10, y: 0, z: 10, color: BLUE };
  const far: PointRecord = { x: 0, y: 0, z: 0, color: RED, label: "a" };
  const viewer = new PointCloudViewer<PointRecord>({
    width: 800,
    height: 600,
    camera: { rotationX: 0, rotationY: 0 },
    requestRedraw: () => {
      redraws += 1;
    },
  });
  viewer.setDataset([near, far], pointRecordAdapter);
  assert.equal(redraws, 1);
  assert.equal(viewer.getCameraState().baseScale, 48, "0.8 * 600 / 10");

  const surface = new RecordingSurface();
  viewer.render(surface);
  assert.deepEqual(surface.circles(), [
    { op: "circle", x: 160, y: 300, diameter: 6, color: RED },
    { op: "circle", x: 640, y: 300, diameter: 6, color: BLUE },
  ]);

  const labelIndex = surface.commands.findIndex((c) => c.op === "text" && c.text === "a");
  assert.deepEqual(surface.commands[labelIndex], { op: "text", text: "a", x: 166, y: 294, color: RED });

  const firstLine = surface.commands.findIndex((c) => c.op === "line");
  const firstCircle = surface.commands.findIndex((c) => c.op === "circle");
  assert.ok(firstLine >= 0 && firstLine < firstCircle, "Axes are drawn behind the points");

  assert.deepEqual(surface.texts().slice(-4), [
    "Rotation (Pitch/Yaw): 0.0°, 0.0°",
    "Zoom: 1.00x",
    "Projection: Orthographic (D=30.0)",
    "Controls: Drag mouse (LMB) to rotate, use mouse wheel to zoom.",
  ]);
  const controls = surface.commands[surface.commands.length - 1];
  assert.deepEqual(controls, {
    op: "text",
    text: "Controls: Drag mouse (LMB) to rotate, use mouse wheel to zoom.",
    x: 10,
    y: 590,
    color: WHITE,
  });

  const hit = viewer.pickAt(161, 301);
  assert.ok(hit);
  assert.equal(hit.index, 1);
  assert.equal(hit.item, far);
  assert.equal(viewer.pickAt(400, 100), null);

  viewer.togglePerspective();
  assert.equal(viewer.isPerspectiveEnabled(), true);
  viewer.zoomBy(1);
  viewer.rotateBy(0, 0);
  assert.equal(redraws, 4);

  surface.clear();
  viewer.render(surface);
  assert.deepEqual(surface.texts().slice(-4, -1), [
    "Rotation (Pitch/Yaw): 0.0°, 0.0°",
    "Zoom: 0.90x",
    "Projection: Perspective (D=30.0)",
  ]);

  viewer.resize(0, 0);
  assert.equal(viewer.getCameraState().baseScale, 1, "Zero-area viewport");
  assert.equal(redraws, 5);

  viewer.setLabelsVisible(false);
  viewer.resize(800, 600);
  surface.clear();
  viewer.render(surface);
  assert.ok(!surface.texts().includes("a"), "Labels can be hidden");
  assert.equal(viewer.getMetrics().frameIndex, 3);
}

// In-place mutation is picked up by datasetChanged.
{
  const items: PointRecord[] = [{ x: 0, y: 0, z: 0 }];
  const viewer = new PointCloudViewer<PointRecord>({ width: 400, height: 400, items, adapter: pointRecordAdapter });
  assert.equal(viewer.getCameraState().baseScale, 50, "Single point falls back");
  items.push({ x: 0, y: 8, z: 0 });
  viewer.datasetChanged();
  assert.equal(viewer.getCameraState().baseScale, 40, "0.8 * 400 / 8");
  assert.equal(viewer.getItemCount(), 2);
}

// HUD toggle.
{
  let redraws = 0;
  const viewer = new PointCloudViewer<PointRecord>({
    width: 800,
    height: 600,
    items: [{ x: 0, y: 0, z: 0 }, { x: 10, y: 0, z: 0 }],
    adapter: pointRecordAdapter,
    requestRedraw: () => {
      redraws += 1;
    },
  });
  viewer.setHudVisible(false);
  assert.equal(redraws, 1);

  const surface = new RecordingSurface();
  viewer.render(surface);
  assert.equal(surface.circles().length, 2);
  assert.equal(surface.commands[surface.commands.length - 1].op, "circle", "Points are the last thing drawn");
  assert.ok(!surface.texts().includes("Zoom: 1.00x"));

  viewer.setHudVisible(true);
  surface.clear();
  viewer.render(surface);
  assert.deepEqual(surface.texts().slice(-3), [
    "Zoom: 1.00x",
    "Projection: Orthographic (D=30.0)",
    "Controls: Drag mouse (LMB) to rotate, use mouse wheel to zoom.",
  ]);
}

// Default view.
{
  const viewer = new PointCloudViewer<PointRecord>();
  const s = viewer.getCameraState();
  assert.equal(s.rotationX, Math.PI / 6);
  assert.equal(s.rotationY, Math.PI / 4);
  assert.equal(s.userZoom, 1);
  assert.equal(s.perspective, false);
  assert.deepEqual(hudLines(s, DEFAULT_VIEWER_CONFIG.viewerDistance), [
    "Rotation (Pitch/Yaw): 30.0°, 45.0°",
    "Zoom: 1.00x",
    "Projection: Orthographic (D=30.0)",
  ]);

  viewer.setRotation(1, 2);
  viewer.setZoom(0.01);
  assert.equal(viewer.getCameraState().userZoom, 0.1);
  viewer.resetView();
  assert.equal(viewer.getCameraState().rotationX, Math.PI / 6);
  assert.equal(viewer.getCameraState().userZoom, 1);
}

console.log("viewer frame smoke: ok");
