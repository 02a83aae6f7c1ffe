import * as assert from "node:assert/strict";
import { RenderPipeline } from "../src/viewer/core/RenderPipeline";
import { LayerScheduler } from "../src/viewer/core/LayerScheduler";
import { RecordingSurface } from "../src/viewer/surface/RecordingSurface";
import { PointCloudViewer } from "../src/viewer/PointCloudViewer";
import type { PointRecord } from "../src/types";
import type { Logger, RenderContext, ViewerLayer } from "../src/viewer/types/contracts";

function textLayer(id: string, renderOrder: number, result?: boolean): ViewerLayer {
  return {
    id,
    renderOrder,
    render: (ctx: RenderContext) => {
      ctx.surface.drawText(id, 0, 0);
      return result;
    },
  };
}

function ctx(): RenderContext & { surface: RecordingSurface } {
  return { surface: new RecordingSurface(), viewportWidth: 10, viewportHeight: 10 };
}

{
  const scheduler = new LayerScheduler();
  scheduler.register(textLayer("b", 200));
  scheduler.register(textLayer("a", 200));
  scheduler.register(textLayer("z", 100));
  assert.deepEqual(scheduler.getRenderLayers().map((l) => l.id), ["z", "a", "b"]);
  assert.throws(() => scheduler.register(textLayer("a", 1)), /Duplicate layer id: a/);
  assert.equal(scheduler.unregister("a"), true);
  assert.equal(scheduler.unregister("a"), false);
  assert.equal(scheduler.getLayerCount(), 2);
}

{
  const pipeline = new RenderPipeline();
  pipeline.registerLayer(textLayer("hud", 300));
  pipeline.registerLayer(textLayer("points", 200, false));
  pipeline.registerLayer(textLayer("axes", 100));
  assert.throws(() => pipeline.render(ctx()), /init\(\) must be called/);

  pipeline.init();
  const c = ctx();
  pipeline.render(c);
  assert.deepEqual(c.surface.texts(), ["axes", "points"], "A layer returning false ends the frame");
  assert.equal(pipeline.getMetrics().frameIndex, 1);
  assert.equal(pipeline.getMetrics().layerCount, 3);

  pipeline.unregisterLayer("points");
  const d = ctx();
  pipeline.render(d);
  assert.deepEqual(d.surface.texts(), ["axes", "hud"]);
}

{
  const errors: Array<Record<string, unknown> | undefined> = [];
  const logger: Logger = {
    debug: () => undefined,
    warn: () => undefined,
    error: (_message, meta) => errors.push(meta),
  };
  const broken: ViewerLayer = {
    id: "broken",
    renderOrder: 150,
    render: () => {
      throw new Error("boom");
    },
  };

  const strict = new RenderPipeline({ logger });
  strict.registerLayer(broken);
  strict.init();
  assert.throws(() => strict.render(ctx()), /boom/);
  assert.equal(errors.length, 1);
  assert.equal(errors[0]?.layerId, "broken");
  assert.equal(errors[0]?.phase, "render");

  const lenient = new RenderPipeline({ logger, strictLayerErrors: false });
  lenient.registerLayer(textLayer("axes", 100));
  lenient.registerLayer(broken);
  lenient.registerLayer(textLayer("hud", 300));
  lenient.init();
  const c = ctx();
  lenient.render(c);
  assert.deepEqual(c.surface.texts(), ["axes", "hud"], "Other layers still draw");
  assert.equal(errors.length, 2);
}

{
  const order: string[] = [];
  const pipeline = new RenderPipeline();
  const tracked = (id: string, renderOrder: number): ViewerLayer => ({
    id,
    renderOrder,
    init: () => order.push(`init:${id}`),
    dispose: () => order.push(`dispose:${id}`),
  });
  pipeline.registerLayer(tracked("a", 1));
  pipeline.init();
  pipeline.registerLayer(tracked("b", 2));
  pipeline.dispose();
  assert.deepEqual(order, ["init:a", "init:b", "dispose:b", "dispose:a"]);
}

{
  const order: string[] = [];
  const tracked = (id: string): ViewerLayer => ({
    id,
    renderOrder: 150,
    init: () => order.push(`init:${id}`),
    dispose: () => order.push(`dispose:${id}`),
  });

  const idle = new RenderPipeline();
  idle.registerLayer(tracked("idle"));
  assert.equal(idle.unregisterLayer("idle"), true);
  assert.deepEqual(order, [], "Layers removed before init are never disposed");

  const running = new RenderPipeline();
  running.registerLayer(tracked("grid"));
  running.init();
  assert.equal(running.unregisterLayer("grid"), true);
  assert.equal(running.unregisterLayer("grid"), false);
  assert.deepEqual(order, ["init:grid", "dispose:grid"]);
  assert.equal(running.getMetrics().layerCount, 0);
}

{
  let redraws = 0;
  const disposed: string[] = [];
  const viewer = new PointCloudViewer<PointRecord>({
    width: 10,
    height: 10,
    requestRedraw: () => {
      redraws += 1;
    },
  });
  viewer.registerLayer({
    id: "overlay",
    renderOrder: 50,
    render: (c) => c.surface.drawText("overlay", 0, 0),
    dispose: () => disposed.push("overlay"),
  });
  assert.equal(redraws, 1);
  assert.equal(viewer.getMetrics().layerCount, 4);

  assert.equal(viewer.unregisterLayer("overlay"), true);
  assert.deepEqual(disposed, ["overlay"]);
  assert.equal(redraws, 2);
  assert.equal(viewer.unregisterLayer("overlay"), false);
  assert.equal(redraws, 2, "Removing an unknown layer does not redraw");

  const surface = new RecordingSurface();
  viewer.render(surface);
  assert.deepEqual(surface.texts(), ["No data to display."]);
}

console.log("viewer pipeline smoke: ok");
