import * as assert from "node:assert/strict";
import { AxesModule, adjacentCorner, findFarCorner } from "../src/viewer/modules/AxesModule";
import { RecordingSurface } from "../src/viewer/surface/RecordingSurface";
import { createProjector } from "../src/viewer/projection/project";
import { createExtrema, point3D } from "../src/geometry/point";
import { computeBaseScale } from "../src/viewer/scene/extrema";
import { DEFAULT_VIEWER_CONFIG } from "../src/viewer/config/defaults";
import type { CameraState } from "../src/viewer/types/camera";
import type { BoundingExtrema } from "../src/types";

const cfg = DEFAULT_VIEWER_CONFIG;
const box = createExtrema(point3D(0, 0, 0), point3D(10, 20, 30));

function axes(extrema: BoundingExtrema, cam: CameraState, empty = false): AxesModule {
  return new AxesModule({
    config: cfg,
    getCameraState: () => cam,
    getExtrema: () => extrema,
    isEmpty: () => empty,
  });
}

{
  assert.deepEqual(adjacentCorner(point3D(0, 20, 0), box, "x"), { x: 10, y: 20, z: 0 });
  assert.deepEqual(adjacentCorner(point3D(0, 20, 0), box, "y"), { x: 0, y: 0, z: 0 });
  assert.deepEqual(adjacentCorner(point3D(10, 20, 30), box, "z"), { x: 10, y: 20, z: 0 });
}

{
  const cam: CameraState = { rotationX: 0, rotationY: 0, baseScale: 1, userZoom: 1, perspective: false };
  const far = findFarCorner(box, createProjector(cam, box, 800, 600, cfg));
  assert.ok(far);
  assert.deepEqual(far.corner, { x: 0, y: 0, z: 0 }, "First of the tied nearest-z corners");
  assert.equal(far.screen.depth, -15);

  const turned: CameraState = { ...cam, rotationY: Math.PI };
  const back = findFarCorner(box, createProjector(turned, box, 800, 600, cfg));
  assert.ok(back);
  assert.equal(back.corner.z, 30, "Half a turn puts the max-z face at the back");

  assert.equal(findFarCorner(box, () => null), null, "No projectable corner, no far corner");
}

{
  const baseScale = computeBaseScale(box, true, 800, 600, cfg);
  assert.equal(baseScale, 16);
  const cam: CameraState = { rotationX: 0, rotationY: 0, baseScale, userZoom: 1, perspective: false };
  const surface = new RecordingSurface();
  axes(box, cam).render({ surface, viewportWidth: 800, viewportHeight: 600 });

  const light = cfg.axisColor;
  assert.deepEqual(surface.commands, [
    { op: "color", color: light },
    { op: "strokeWidth", width: 1.5 },
    { op: "font", font: cfg.axisFont },
    { op: "text", text: "(0.0, 0.0, 0.0)", x: 300, y: 475, color: light },
    { op: "line", x1: 320, y1: 460, x2: 480, y2: 460 },
    { op: "text", text: "10.0", x: 472, y: 475, color: light },
    { op: "text", text: "X", x: 396, y: 452, color: light },
    { op: "line", x1: 320, y1: 460, x2: 320, y2: 140 },
    { op: "text", text: "20.0", x: 312, y: 155, color: light },
    { op: "text", text: "Y", x: 328, y: 304, color: light },
    { op: "line", x1: 320, y1: 460, x2: 320, y2: 460 },
    { op: "text", text: "30.0", x: 312, y: 475, color: light },
    { op: "text", text: "Z", x: 316, y: 452, color: light },
  ]);
}

{
  const cam: CameraState = { rotationX: 0.4, rotationY: 0.9, baseScale: 16, userZoom: 1, perspective: false };

  const empty = new RecordingSurface();
  axes(box, cam, true).render({ surface: empty, viewportWidth: 800, viewportHeight: 600 });
  assert.equal(empty.commands.length, 0, "No axes without data");

  const flat = new RecordingSurface();
  const point = createExtrema(point3D(4, 4, 4), point3D(4, 4, 4));
  axes(point, cam).render({ surface: flat, viewportWidth: 800, viewportHeight: 600 });
  assert.equal(flat.lines().length, 3, "A single point still gets its axes");
  assert.deepEqual(flat.texts(), ["(4.0, 4.0, 4.0)", "4.0", "X", "4.0", "Y", "4.0", "Z"]);

  const hidden = new RecordingSurface();
  const module = axes(box, cam);
  module.setVisible(false);
  module.render({ surface: hidden, viewportWidth: 800, viewportHeight: 600 });
  assert.equal(hidden.commands.length, 0);

  const rotated = new RecordingSurface();
  axes(box, cam).render({ surface: rotated, viewportWidth: 800, viewportHeight: 600 });
  assert.equal(rotated.lines().length, 3, "One line per axis");
  assert.deepEqual(
    rotated.texts().filter((t) => t.length === 1),
    ["X", "Y", "Z"],
  );
}

// Perspective: the max-z corners sit behind the viewer, so Z is skipped.
{
  const deep = createExtrema(point3D(0, 0, 0), point3D(10, 20, 80));
  const cam: CameraState = { rotationX: 0, rotationY: 0, baseScale: 1, userZoom: 1, perspective: true };
  const project = createProjector(cam, deep, 800, 600, cfg);
  assert.equal(project(point3D(0, 0, 80)), null);

  const surface = new RecordingSurface();
  axes(deep, cam).render({ surface, viewportWidth: 800, viewportHeight: 600 });
  assert.equal(surface.lines().length, 2);
  assert.deepEqual(surface.texts(), ["(0.0, 0.0, 0.0)", "10.0", "X", "20.0", "Y"]);
}

console.log("viewer axes smoke: ok");
