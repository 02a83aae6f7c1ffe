import * as assert from "node:assert/strict";
import { createProjector, effectiveScale, projectPoint, viewportCenter } from "../src/viewer/projection/project";
import { createExtrema, point3D } from "../src/geometry/point";
import { DEFAULT_VIEWER_CONFIG } from "../src/viewer/config/defaults";
import type { CameraState } from "../src/viewer/types/camera";

const cfg = DEFAULT_VIEWER_CONFIG;

function camera(overrides: Partial<CameraState> = {}): CameraState {
  return { rotationX: 0, rotationY: 0, baseScale: 1, userZoom: 1, perspective: false, ...overrides };
}

{
  const r = projectPoint(5, 3, 0, camera(), { x: 100, y: 100 }, cfg);
  assert.ok(r);
  assert.equal(r.x, 105);
  assert.equal(r.y, 97, "Screen Y is inverted");
  assert.equal(r.depth, 0);
  assert.equal(r.perspectiveFactor, 1);
}

{
  assert.equal(effectiveScale({ baseScale: 48, userZoom: 0.5 }), 24);
  const r = projectPoint(2, -1, 7, camera({ baseScale: 48, userZoom: 0.5 }), { x: 400, y: 300 }, cfg);
  assert.ok(r);
  assert.equal(r.x, 448);
  assert.equal(r.y, 324);
  assert.equal(r.depth, 7);
}

{
  // Truncation goes toward zero, not down.
  const r = projectPoint(-1.5, 1.5, 0, camera(), { x: 0, y: 0 }, cfg);
  assert.ok(r);
  assert.equal(r.x, -1);
  assert.equal(r.y, -1);
}

{
  const persp = camera({ perspective: true });
  assert.equal(projectPoint(0, 0, 29.95, persp, { x: 0, y: 0 }, cfg), null, "Inside the near limit");
  assert.equal(projectPoint(0, 0, 30, persp, { x: 0, y: 0 }, cfg), null, "At the viewer");
  assert.equal(projectPoint(0, 0, 45, persp, { x: 0, y: 0 }, cfg), null, "Behind the viewer");

  const near = projectPoint(1, 0, 15, persp, { x: 0, y: 0 }, cfg);
  assert.ok(near);
  assert.equal(near.perspectiveFactor, 2);
  assert.equal(near.x, 2);

  const far = projectPoint(4, 0, -30, persp, { x: 0, y: 0 }, cfg);
  assert.ok(far);
  assert.equal(far.perspectiveFactor, 0.5);
  assert.equal(far.x, 2);

  const ortho = projectPoint(0, 0, 45, camera(), { x: 0, y: 0 }, cfg);
  assert.ok(ortho, "Orthographic projection never drops points");
}

{
  // Quarter turn around Y sends +x to negative depth.
  const r = projectPoint(1, 0, 0, camera({ rotationY: Math.PI / 2, baseScale: 10 }), { x: 100, y: 100 }, cfg);
  assert.ok(r);
  assert.equal(r.x, 100);
  assert.equal(r.depth, -1);

  // Quarter turn around X lifts +z onto -y (screen down).
  const s = projectPoint(0, 0, 1, camera({ rotationX: Math.PI / 2, baseScale: 10 }), { x: 100, y: 100 }, cfg);
  assert.ok(s);
  assert.equal(s.y, 110);
}

{
  assert.deepEqual(viewportCenter(801, 601), { x: 400, y: 300 });
  const extrema = createExtrema(point3D(100, 100, 100), point3D(110, 110, 110));
  const project = createProjector(camera(), extrema, 200, 200, cfg);
  const center = project(point3D(105, 105, 105));
  assert.ok(center);
  assert.equal(center.x, 100, "Midpoint of the data maps to the viewport center");
  assert.equal(center.y, 100);
}

console.log("viewer projection smoke: ok");
