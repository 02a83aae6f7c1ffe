import * as assert from "node:assert/strict";
import { createItemAdapter, pointRecordAdapter, resolveColor } from "../src/adapters/records";
import { DEFAULT_POINT_COLOR } from "../src/viewer/config/defaults";
import type { PointRecord } from "../src/types";

type Sample = { name: string; coords: [number, number, number]; mass: number };

const samples: Sample[] = [
  { name: "alpha", coords: [1, -2, 3], mass: 4 },
  { name: "beta", coords: [-5, 6, 0], mass: 1 },
  { name: "gamma", coords: [2, 2, -7], mass: 9 },
];

{
  const adapter = createItemAdapter<Sample>({
    position: (s) => ({ x: s.coords[0], y: s.coords[1], z: s.coords[2] }),
    label: (s) => s.name,
    color: (s) => (s.mass > 2 ? { r: 255, g: 0, b: 0 } : { r: 0, g: 0, b: 255 }),
  });
  assert.deepEqual(adapter.getItem(samples, 2), { x: 2, y: 2, z: -7 });
  assert.deepEqual(adapter.getMin(samples), { x: -5, y: -2, z: -7 });
  assert.deepEqual(adapter.getMax(samples), { x: 2, y: 6, z: 3 });
  assert.equal(adapter.getLabel(samples, 1), "beta");
  assert.deepEqual(adapter.getColor(samples, 1), { r: 0, g: 0, b: 255 });
}

{
  const bare = createItemAdapter<Sample>({
    position: (s) => ({ x: s.coords[0], y: s.coords[1], z: s.coords[2] }),
  });
  assert.equal(bare.getColor(samples, 0), DEFAULT_POINT_COLOR);
  assert.equal(bare.getLabel(samples, 0), null);
  assert.deepEqual(bare.getMin([]), { x: 0, y: 0, z: 0 });
}

{
  const records: PointRecord[] = [
    { x: 1, y: 1, z: 1, color: "#ff0000", label: "one" },
    { x: 2, y: 3, z: 4, color: { r: 1, g: 2, b: 3 } },
    { x: 0, y: 5, z: -1 },
  ];
  assert.deepEqual(pointRecordAdapter.getColor(records, 0), { r: 255, g: 0, b: 0 });
  assert.deepEqual(pointRecordAdapter.getColor(records, 1), { r: 1, g: 2, b: 3 });
  assert.equal(pointRecordAdapter.getColor(records, 2), DEFAULT_POINT_COLOR);
  assert.equal(pointRecordAdapter.getLabel(records, 0), "one");
  assert.equal(pointRecordAdapter.getLabel(records, 1), undefined);
  assert.deepEqual(pointRecordAdapter.getMin(records), { x: 0, y: 1, z: -1 });
  assert.deepEqual(pointRecordAdapter.getMax(records), { x: 2, y: 5, z: 4 });

  assert.equal(resolveColor("#00ff00"), resolveColor("#00ff00"), "Parsed colors are cached");
}

console.log("viewer adapters smoke: ok");
