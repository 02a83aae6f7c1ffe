import * as assert from "node:assert/strict";
import { computeBaseScale, computeExtrema, EMPTY_EXTREMA } from "../src/viewer/scene/extrema";
import { SceneData } from "../src/viewer/scene/SceneData";
import { PointCloudViewer } from "../src/viewer/PointCloudViewer";
import { createExtrema, point3D } from "../src/geometry/point";
import { pointRecordAdapter } from "../src/adapters/records";
import { DEFAULT_VIEWER_CONFIG } from "../src/viewer/config/defaults";
import type { Logger } from "../src/viewer/types/contracts";
import type { PointRecord } from "../src/types";

const cfg = DEFAULT_VIEWER_CONFIG;

{
  const e = createExtrema(point3D(0, 0, 0), point3D(10, 0, 0));
  assert.equal(computeBaseScale(e, true, 800, 600, cfg), 48.0, "0.8 * 600 / 10");
  assert.equal(computeBaseScale(e, true, 0, 600, cfg), 1.0, "Zero width viewport");
  assert.equal(computeBaseScale(e, true, 800, 0, cfg), 1.0, "Zero height viewport");
  assert.equal(computeBaseScale(e, false, 800, 600, cfg), 1.0, "No data");
}

{
  const same = createExtrema(point3D(3, 3, 3), point3D(3, 3, 3));
  assert.equal(computeBaseScale(same, true, 800, 600, cfg), 50.0, "Single point falls back");
  const tiny = createExtrema(point3D(0, 0, 0), point3D(1e-10, 0, 0));
  assert.equal(computeBaseScale(tiny, true, 1024, 768, cfg), 50.0, "Sub-epsilon range falls back");
  assert.equal(computeBaseScale(same, true, 0, 0, cfg), 1.0, "Zero viewport wins over degenerate data");
}

{
  const items: PointRecord[] = [
    { x: -2, y: 4, z: 1 },
    { x: 6, y: -4, z: 3 },
    { x: 0, y: 0, z: 9 },
  ];
  const e = computeExtrema(items, pointRecordAdapter);
  assert.deepEqual(e.mins, { x: -2, y: -4, z: 1 });
  assert.deepEqual(e.maxs, { x: 6, y: 4, z: 9 });
  assert.deepEqual(e.mids, { x: 2, y: 0, z: 5 });
  assert.equal(computeExtrema([], pointRecordAdapter), EMPTY_EXTREMA);
}

{
  assert.ok(Object.isFrozen(EMPTY_EXTREMA));
  assert.ok(Object.isFrozen(EMPTY_EXTREMA.mids));
  const viewer = new PointCloudViewer<PointRecord>({ width: 100, height: 100 });
  const shared = viewer.getExtrema();
  assert.equal(shared, EMPTY_EXTREMA);
  assert.equal(Reflect.set(shared, "mins", point3D(1, 1, 1)), false, "Empty extrema cannot be replaced");
  assert.equal(Reflect.set(shared.mids, "x", 5), false);
  assert.deepEqual(new PointCloudViewer<PointRecord>().getExtrema().mins, { x: 0, y: 0, z: 0 });
}

{
  const messages: string[] = [];
  const logger: Logger = {
    debug: (message) => messages.push(message),
    warn: () => undefined,
    error: () => undefined,
  };
  const scene = new SceneData<PointRecord>({ config: cfg, logger });
  assert.doesNotThrow(() => scene.setDataset([], pointRecordAdapter));
  const e = scene.getExtrema();
  assert.deepEqual(e.mins, { x: 0, y: 0, z: 0 });
  assert.deepEqual(e.maxs, { x: 0, y: 0, z: 0 });
  assert.deepEqual(e.mids, { x: 0, y: 0, z: 0 });
  assert.ok(scene.isEmpty());
  assert.equal(scene.getBaseScale(), 1.0);
  assert.ok(messages.includes("Dataset changed"), "Dataset changes should be logged");

  const items: PointRecord[] = [{ x: 0, y: 0, z: 0 }, { x: 10, y: 0, z: 0 }];
  scene.setDataset(items, pointRecordAdapter);
  assert.equal(scene.getBaseScale(), 1.0, "No viewport yet");
  scene.resize(800, 600);
  assert.equal(scene.getBaseScale(), 48.0, "Resize recomputes the base scale");

  items.push({ x: 0, y: 20, z: 0 });
  scene.datasetChanged();
  assert.deepEqual(scene.getExtrema().maxs, { x: 10, y: 20, z: 0 });
  assert.equal(scene.getBaseScale(), 24.0, "0.8 * 600 / 20");

  scene.setDataset([{ x: 7, y: 7, z: 7 }], pointRecordAdapter);
  assert.equal(scene.getBaseScale(), 50.0);
}

console.log("viewer extrema smoke: ok");
