import * as assert from "node:assert/strict";
import { generateSampleCloud } from "../src/generateSampleCloud";

{
  const a = generateSampleCloud({ seed: "fixed", count: 50 });
  const b = generateSampleCloud({ seed: "fixed", count: 50 });
  const c = generateSampleCloud({ seed: "other", count: 50 });
  assert.equal(a.length, 50);
  assert.deepEqual(a, b, "Same seed, same cloud");
  assert.notDeepEqual(a, c, "Different seed, different cloud");
}

{
  const cube = generateSampleCloud({ shape: "cube", count: 200, scale: 4 });
  for (const p of cube) {
    assert.ok(Math.abs(p.x) <= 4 && Math.abs(p.y) <= 4 && Math.abs(p.z) <= 4, "Cube stays inside its half-extent");
  }

  const helix = generateSampleCloud({ shape: "helix", count: 3, scale: 10 });
  assert.deepEqual(helix.map((p) => p.y), [-10, 0, 10]);
  assert.deepEqual(generateSampleCloud({ shape: "helix", count: 1 }).map((p) => p.y), [-10]);
}

{
  const labelled = generateSampleCloud({ count: 7, labelEvery: 3 });
  assert.deepEqual(labelled.map((p) => p.label), ["#0", undefined, undefined, "#3", undefined, undefined, "#6"]);
  assert.equal(generateSampleCloud({ count: 0 }).length, 0);
}

{
  assert.throws(() => generateSampleCloud({ count: -1 }), RangeError);
  assert.throws(() => generateSampleCloud({ count: 2.5 }), RangeError);
  assert.throws(() => generateSampleCloud({ clusters: 0 }), RangeError);
}

console.log("viewer sample cloud smoke: ok");
