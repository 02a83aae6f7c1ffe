import * as assert from "node:assert/strict";
import { PointCloudViewer } from "../src/viewer/PointCloudViewer";
import { InputReplayPlayer, replay, type InputReplayScript } from "../src/viewer/parity/InputReplay";
import { pointRecordAdapter } from "../src/adapters/records";
import { generateSampleCloud } from "../src/generateSampleCloud";
import type { PointRecord } from "../src/types";

const cloud = generateSampleCloud({ shape: "helix", count: 120, seed: "replay" });

const script: InputReplayScript = {
  version: 1,
  name: "rotate-zoom-perspective",
  frames: [
    { atMs: 50, event: { type: "rotate", deltaX: 24, deltaY: -9, pointer: "mouse" } },
    { atMs: 100, event: { type: "zoom", notches: -2, pointer: "mouse" } },
    { atMs: 150, event: { type: "togglePerspective" } },
    { atMs: 220, event: { type: "rotate", deltaX: -15, deltaY: 31, pointer: "mouse" } },
    { atMs: 260, event: { type: "zoom", notches: 1, pointer: "mouse" } },
    { atMs: 300, event: { type: "resize", width: 1024, height: 768 } },
    { atMs: 340, event: { type: "tap", x: 512, y: 384, pointer: "mouse" } },
  ],
};

function run(stepMs: number) {
  const viewer = new PointCloudViewer<PointRecord>({
    width: 800,
    height: 600,
    items: cloud,
    adapter: pointRecordAdapter,
  });
  const outcome = replay(viewer, script, stepMs);
  return { viewer, outcome, scene: viewer.projectScene() };
}

const a = run(10);
const b = run(16);

assert.equal(a.outcome.applied, 7);
assert.equal(a.outcome.elapsedMs, 340);
assert.equal(b.outcome.elapsedMs, 352, "Last frame lands on the first tick at or after it");
assert.deepEqual(a.viewer.getCameraState(), b.viewer.getCameraState(), "Camera state should not depend on the tick size");
assert.deepEqual(a.scene, b.scene, "Projected frame should be deterministic");
assert.equal(a.outcome.picks.length, 1);
assert.equal(a.outcome.picks[0]?.index, b.outcome.picks[0]?.index);

const s = a.viewer.getCameraState();
assert.equal(s.perspective, true);
assert.equal(s.rotationY, Math.PI / 4 + 24 * 0.01 + -15 * 0.01);
assert.equal(s.rotationX, Math.PI / 6 + -9 * 0.01 + 31 * 0.01);
assert.ok(Math.abs(s.userZoom - 1.2 * 0.9) < 1e-12);
assert.deepEqual(a.viewer.getViewport(), { width: 1024, height: 768 });

// One point at the center of a 400x400 viewport.
{
  const only: PointRecord = { x: 3, y: 3, z: 3, label: "only" };
  const viewer = new PointCloudViewer<PointRecord>({ width: 400, height: 400, items: [only], adapter: pointRecordAdapter });
  const taps: InputReplayScript = {
    version: 1,
    name: "taps",
    frames: [
      { atMs: 0, event: { type: "tap", x: 200, y: 200, pointer: "touch" } },
      { atMs: 40, event: { type: "tap", x: 10, y: 10, pointer: "touch" } },
      { atMs: 40, event: { type: "zoom", notches: 1, pointer: "mouse" } },
    ],
  };

  const player = new InputReplayPlayer(taps, viewer);
  assert.equal(player.advanceTo(0), 1);
  assert.equal(player.advanceTo(39), 0);
  assert.equal(player.isFinished(), false);
  assert.equal(player.advanceTo(40), 2, "Frames sharing a timestamp apply on the same tick");
  assert.equal(player.isFinished(), true);

  const picks = player.getPicks();
  assert.equal(picks.length, 2, "Only taps are recorded");
  assert.equal(picks[0]?.item, only);
  assert.equal(picks[0]?.index, 0);
  assert.equal(picks[1], null);

  player.rewind();
  assert.equal(player.getPicks().length, 0);
  assert.equal(player.isFinished(), false);
}

{
  const viewer = new PointCloudViewer<PointRecord>();
  const unordered: InputReplayScript = {
    version: 1,
    name: "unordered",
    frames: [
      { atMs: 20, event: { type: "togglePerspective" } },
      { atMs: 10, event: { type: "resetView" } },
    ],
  };
  assert.throws(() => new InputReplayPlayer(unordered, viewer), RangeError);
  assert.throws(() => replay(viewer, script, 0), /stepMs must be positive/);
  assert.deepEqual(replay(viewer, { version: 1, name: "empty", frames: [] }), { applied: 0, picks: [], elapsedMs: 0 });
}

console.log("viewer replay smoke: ok", {
  rotationX: s.rotationX,
  rotationY: s.rotationY,
  userZoom: s.userZoom,
  tapped: a.outcome.picks[0]?.index ?? null,
});
