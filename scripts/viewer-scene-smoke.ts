import * as assert from "node:assert/strict";
import { buildScene, dotSize, pickProjected, projectItems, sortByDepth } from "../src/viewer/scene/buildScene";
import { createProjector } from "../src/viewer/projection/project";
import { computeExtrema } from "../src/viewer/scene/extrema";
import { pointRecordAdapter } from "../src/adapters/records";
import { generateSampleCloud } from "../src/generateSampleCloud";
import { DEFAULT_VIEWER_CONFIG } from "../src/viewer/config/defaults";
import type { CameraState, ProjectedPoint } from "../src/viewer/types/camera";
import type { PointRecord } from "../src/types";

const cfg = DEFAULT_VIEWER_CONFIG;

function assertPaintersOrder(points: readonly ProjectedPoint[], message: string): void {
  for (let i = 1; i < points.length; i++) {
    assert.ok(points[i - 1].depth <= points[i].depth, `${message} (at ${i})`);
  }
}

{
  assert.equal(dotSize(1, cfg), 6);
  assert.equal(dotSize(1.2, cfg), 7);
  assert.equal(dotSize(3, cfg), 15, "Clamped to the max dot size");
  assert.equal(dotSize(0.2, cfg), 2, "Clamped to the min dot size");
}

{
  const items: PointRecord[] = [
    { x: 0, y: 0, z: 5, label: "front" },
    { x: 0, y: 0, z: -5, label: "   " },
    { x: 0, y: 0, z: 0 },
  ];
  const cam: CameraState = { rotationX: 0, rotationY: 0, baseScale: 1, userZoom: 1, perspective: false };
  const project = createProjector(cam, computeExtrema(items, pointRecordAdapter), 100, 100, cfg);

  const raw = projectItems(items, pointRecordAdapter, project, cfg);
  assert.deepEqual(raw.map((p) => p.index), [0, 1, 2], "Projection keeps dataset order");
  assert.equal(raw[0].label, "front");
  assert.equal(raw[1].label, null, "Blank labels are dropped");
  assert.equal(raw[2].label, null);

  const sorted = sortByDepth(raw);
  assert.deepEqual(sorted.map((p) => p.index), [1, 2, 0], "Farthest first, nearest last");
  assert.deepEqual(sorted.map((p) => p.depth), [-5, 0, 5]);
}

{
  // Equal depths keep their dataset order.
  const items: PointRecord[] = [
    { x: 1, y: 0, z: 0, label: "a" },
    { x: 2, y: 0, z: 0, label: "b" },
    { x: 3, y: 0, z: 0, label: "c" },
  ];
  const cam: CameraState = { rotationX: 0, rotationY: 0, baseScale: 1, userZoom: 1, perspective: false };
  const project = createProjector(cam, computeExtrema(items, pointRecordAdapter), 100, 100, cfg);
  const scene = buildScene(items, pointRecordAdapter, project, cfg);
  assert.deepEqual(scene.map((p) => p.label), ["a", "b", "c"]);
}

{
  const cloud = generateSampleCloud({ count: 300, seed: "depth-order" });
  const extrema = computeExtrema(cloud, pointRecordAdapter);
  for (const [rx, ry, perspective] of [
    [0.3, 1.1, false],
    [-2.2, 0.7, true],
    [Math.PI, -Math.PI / 3, true],
  ] as const) {
    const cam: CameraState = { rotationX: rx, rotationY: ry, baseScale: 20, userZoom: 1, perspective };
    const project = createProjector(cam, extrema, 640, 480, cfg);
    const scene = buildScene(cloud, pointRecordAdapter, project, cfg);
    assert.equal(scene.length, cloud.length, "The sample cloud fits in front of the viewer");
    assertPaintersOrder(scene, `Depth order for rx=${rx} ry=${ry}`);
  }
}

{
  // Perspective drops items behind the viewer.
  const items: PointRecord[] = [
    { x: 0, y: 0, z: -40 },
    { x: 0, y: 0, z: 0 },
    { x: 0, y: 0, z: 40 },
  ];
  const cam: CameraState = { rotationX: 0, rotationY: 0, baseScale: 1, userZoom: 1, perspective: true };
  const project = createProjector(cam, computeExtrema(items, pointRecordAdapter), 100, 100, cfg);
  const scene = buildScene(items, pointRecordAdapter, project, cfg);
  assert.deepEqual(scene.map((p) => p.index), [0, 1]);
  assert.equal(scene[0].size, 2, "30 / 70 shrinks the dot to the minimum");
  assert.equal(scene[1].size, 6);
}

{
  const points: ProjectedPoint[] = [
    { screenX: 50, screenY: 50, depth: -1, size: 6, color: { r: 0, g: 0, b: 0 }, label: null, index: 0 },
    { screenX: 52, screenY: 50, depth: 1, size: 6, color: { r: 0, g: 0, b: 0 }, label: null, index: 1 },
  ];
  assert.equal(pickProjected(points, 51, 50)?.index, 1, "Topmost dot wins");
  assert.equal(pickProjected(points, 44, 50)?.index, 0);
  assert.equal(pickProjected(points, 50, 80), null);
}

console.log("viewer scene smoke: ok");
