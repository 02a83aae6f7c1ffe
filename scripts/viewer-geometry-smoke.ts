import * as assert from "node:assert/strict";
import { boxCorners, createExtrema, maxRange, midpoint, point3D } from "../src/geometry/point";
import { formatCoordinate, formatFixed1, formatFixed2, formatTuple } from "../src/viewer/format/numbers";

{
  const e = createExtrema(point3D(0, 0, 0), point3D(10, 20, 30));
  assert.deepEqual(e.mids, { x: 5, y: 10, z: 15 }, "Mids should be the per-axis midpoint");
  assert.equal(maxRange(e), 30);

  const corners = boxCorners(e);
  assert.equal(corners.length, 8);
  assert.deepEqual(corners[0], { x: 0, y: 0, z: 0 });
  assert.deepEqual(corners[1], { x: 10, y: 0, z: 0 });
  assert.deepEqual(corners[2], { x: 0, y: 20, z: 0 });
  assert.deepEqual(corners[7], { x: 10, y: 20, z: 30 });
  const unique = new Set(corners.map((c) => `${c.x},${c.y},${c.z}`));
  assert.equal(unique.size, 8, "Corners should be distinct for a box with volume");
}

{
  assert.deepEqual(midpoint(point3D(-4, 2, 8), point3D(4, 6, 10)), { x: 0, y: 4, z: 9 });
}

{
  assert.equal(formatCoordinate(1234.56), "1,234.6");
  assert.equal(formatCoordinate(0), "0.0");
  assert.equal(formatCoordinate(-1234.5), "-1,234.5");
  assert.equal(formatCoordinate(1000000), "1,000,000.0");
  assert.equal(formatTuple(point3D(0, 10, -2.5)), "(0.0, 10.0, -2.5)");
  assert.equal(formatFixed1(45), "45.0");
  assert.equal(formatFixed2(0.9), "0.90");
}

{
  assert.equal(formatCoordinate(2.25), "2.2", "Exact ties go to the even tenth");
  assert.equal(formatCoordinate(0.75), "0.8");
  assert.equal(formatCoordinate(-2.25), "-2.2");
  assert.equal(formatCoordinate(1234.25), "1,234.2");
  assert.equal(formatCoordinate(-0.04), "-0.0", "Negative values keep their sign after rounding to zero");
  assert.equal(formatCoordinate(-0), "-0.0");
  assert.equal(formatTuple(point3D(1234.25, -0.04, 0.05)), "(1,234.2, -0.0, 0.1)");
  assert.equal(formatFixed1(0.25), "0.3", "HUD values round ties away from zero");
  assert.equal(formatFixed1(-0.04), "-0.0");
}

console.log("viewer geometry smoke: ok");
