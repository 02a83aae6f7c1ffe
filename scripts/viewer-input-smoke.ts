import * as assert from "node:assert/strict";
import { InputNormalizer } from "../src/viewer/input/InputNormalizer";
import { CameraController } from "../src/viewer/camera/CameraController";

// Drag: one held pointer emits pixel deltas.
{
  const input = new InputNormalizer();
  assert.deepEqual(input.onPointerMove({ id: 1, x: 5, y: 5, pointer: "mouse" }), [], "Hover does not rotate");
  assert.deepEqual(input.onPointerDown({ id: 1, x: 100, y: 100, pointer: "mouse" }), []);
  assert.ok(input.isDragging());
  assert.deepEqual(input.onPointerMove({ id: 1, x: 110, y: 95, pointer: "mouse" }), [
    { type: "rotate", deltaX: 10, deltaY: -5, pointer: "mouse" },
  ]);
  assert.deepEqual(input.onPointerMove({ id: 1, x: 110, y: 95, pointer: "mouse" }), []);
  assert.deepEqual(input.onPointerMove({ id: 1, x: 104, y: 97, pointer: "mouse" }), [
    { type: "rotate", deltaX: -6, deltaY: 2, pointer: "mouse" },
  ]);
  assert.deepEqual(input.onPointerUp({ id: 1, x: 104, y: 97, pointer: "mouse" }), [], "A drag is not a tap");
  assert.ok(!input.isDragging());
}

// Tap: press and release without moving past the threshold.
{
  const input = new InputNormalizer();
  input.onPointerDown({ id: 7, x: 40, y: 60, pointer: "touch" });
  input.onPointerMove({ id: 7, x: 42, y: 61, pointer: "touch" });
  assert.deepEqual(input.onPointerUp({ id: 7, x: 42, y: 61, pointer: "touch" }), [
    { type: "tap", x: 42, y: 61, pointer: "touch" },
  ]);
  assert.deepEqual(input.onPointerUp({ id: 7, x: 42, y: 61, pointer: "touch" }), [], "Unknown pointer");
}

// Pinch: spreading two pointers by 10% zooms in by one notch.
{
  const input = new InputNormalizer();
  input.onPointerDown({ id: 1, x: 0, y: 0, pointer: "touch" });
  input.onPointerDown({ id: 2, x: 100, y: 0, pointer: "touch" });
  const events = input.onPointerMove({ id: 2, x: 110, y: 0, pointer: "touch" });
  assert.equal(events.length, 1);
  const [zoom] = events;
  assert.ok(zoom.type === "zoom");
  assert.ok(Math.abs(zoom.notches - -1) < 1e-9, `Unexpected notches ${zoom.notches}`);

  input.onPointerUp({ id: 2, x: 110, y: 0, pointer: "touch" });
  assert.deepEqual(input.onPointerMove({ id: 1, x: 3, y: 4, pointer: "touch" }), [
    { type: "rotate", deltaX: 3, deltaY: 4, pointer: "touch" },
  ], "The remaining pointer keeps rotating");
}

// Wheel and keys.
{
  const input = new InputNormalizer();
  assert.deepEqual(input.onWheel(120), [{ type: "zoom", notches: 1, pointer: "mouse" }]);
  assert.deepEqual(input.onWheel(-240), [{ type: "zoom", notches: -2, pointer: "mouse" }]);
  assert.deepEqual(input.onWheel(3, 1), [{ type: "zoom", notches: 1, pointer: "mouse" }]);
  assert.deepEqual(input.onWheel(1, 2), [{ type: "zoom", notches: 1, pointer: "mouse" }]);
  assert.deepEqual(input.onWheel(0), []);
  assert.deepEqual(input.onKey("P"), [{ type: "togglePerspective" }]);
  assert.deepEqual(input.onKey("r"), [{ type: "resetView" }]);
  assert.deepEqual(input.onKey("x"), []);
}

// Camera: drags accumulate exactly, zoom never drops under the floor.
{
  const camera = new CameraController({ rotationX: 0, rotationY: 0 });
  camera.applyDrag({ deltaX: 10, deltaY: -5 });
  assert.equal(camera.getState().rotationY, 10 * 0.01);
  assert.equal(camera.getState().rotationX, -5 * 0.01);

  camera.applyDrag({ deltaX: 3, deltaY: 4 });
  let expectedY = 0;
  expectedY += 10 * 0.01;
  expectedY += 3 * 0.01;
  let expectedX = 0;
  expectedX += -5 * 0.01;
  expectedX += 4 * 0.01;
  assert.equal(camera.getState().rotationY, expectedY);
  assert.equal(camera.getState().rotationX, expectedX);

  for (let i = 0; i < 2000; i++) {
    camera.applyDrag({ deltaX: 37, deltaY: -53 });
  }
  assert.ok(Number.isFinite(camera.getState().rotationX), "Rotation is unbounded but finite");

  camera.applyWheel({ notches: 1 });
  assert.equal(camera.getState().userZoom, 0.9);
  camera.applyWheel({ notches: 50 });
  assert.equal(camera.getState().userZoom, 0.1, "Negative multiplier is clamped");
  camera.applyWheel({ notches: 3 });
  assert.equal(camera.getState().userZoom, 0.1);
  camera.applyWheel({ notches: -1 });
  assert.ok(Math.abs(camera.getState().userZoom - 0.11) < 1e-12);

  for (const n of [12, -0.5, 9.99, 100, -3, 10, 10.5]) {
    camera.applyWheel({ notches: n });
    assert.ok(camera.getState().userZoom >= 0.1, `Zoom floor held after ${n} notches`);
  }

  assert.equal(camera.togglePerspective(), true);
  assert.equal(camera.togglePerspective(), false);
}

console.log("viewer input smoke: ok");
