import { LayerScheduler } from "./LayerScheduler";
import type { LayerPhase, Logger, RenderContext, ViewerLayer, ViewerMetrics } from "../types/contracts";
import { DEFAULT_PIPELINE_CONFIG } from "../config/defaults";

export const NOOP_LOGGER: Logger = {
  debug: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export interface RenderPipelineOptions {
  logger?: Logger;
  strictLayerErrors?: boolean;
}

/**
 * Draws registered layers back to front. A layer whose `render` returns
 * `false` ends the frame early.
 */
export class RenderPipeline {
  private readonly scheduler = new LayerScheduler();
  private readonly logger: Logger;
  private readonly strictLayerErrors: boolean;

  private frameIndex = 0;
  private initialized = false;
  private lastRenderMs = 0;

  constructor(options: RenderPipelineOptions = {}) {
    this.logger = options.logger ?? NOOP_LOGGER;
    this.strictLayerErrors = options.strictLayerErrors ?? DEFAULT_PIPELINE_CONFIG.strictLayerErrors;
  }

  registerLayer(layer: ViewerLayer): void {
    this.scheduler.register(layer);
    if (this.initialized) {
      this.invoke("init", () => layer.init?.(), layer.id);
    }
  }

  /** Removes a layer, disposing it if the pipeline is running. */
  unregisterLayer(id: string): boolean {
    const layer = this.scheduler.get(id);
    if (!layer) return false;
    this.scheduler.unregister(id);
    if (this.initialized) {
      this.invoke("dispose", () => layer.dispose?.(), id);
    }
    return true;
  }

  init(): void {
    if (this.initialized) return;
    for (const layer of this.scheduler.getRenderLayers()) {
      this.invoke("init", () => layer.init?.(), layer.id);
    }
    this.initialized = true;
  }

  render(ctx: RenderContext): void {
    this.ensureInitialized();
    const start = performance.now();
    for (const layer of this.scheduler.getRenderLayers()) {
      const drawn = this.invoke("render", () => layer.render?.(ctx), layer.id);
      if (drawn === false) break;
    }
    this.lastRenderMs = performance.now() - start;
    this.frameIndex += 1;
  }

  dispose(): void {
    const layers = [...this.scheduler.getRenderLayers()].reverse();
    for (const layer of layers) {
      this.invoke("dispose", () => layer.dispose?.(), layer.id);
    }
    this.initialized = false;
  }

  getMetrics(): ViewerMetrics {
    return {
      frameIndex: this.frameIndex,
      lastRenderMs: this.lastRenderMs,
      layerCount: this.scheduler.getLayerCount(),
    };
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error("RenderPipeline.init() must be called before render");
    }
  }

  private invoke<R>(phase: LayerPhase, fn: () => R, layerId: string): R | undefined {
    try {
      return fn();
    } catch (error) {
      this.logger.error(`Layer ${phase} failed`, {
        layerId,
        phase,
        error,
      });
      if (this.strictLayerErrors) {
        throw error;
      }
      return undefined;
    }
  }
}
