import type { BoundingExtrema, ItemAdapter } from "../../types";
import type { Logger } from "../types/contracts";
import type { ViewerConfig } from "../types/camera";
import { computeBaseScale, computeExtrema, EMPTY_EXTREMA } from "./extrema";

/**
 * Owns the dataset, its adapter, the bounding extrema and the viewport size.
 * Extrema and base scale are only recomputed through `datasetChanged` and
 * `resize`.
 */
export class SceneData<T> {
  private items: readonly T[] = [];
  private adapter: ItemAdapter<T> | null = null;
  private extrema: BoundingExtrema = EMPTY_EXTREMA;
  private baseScale = 1.0;
  private viewportWidth = 0;
  private viewportHeight = 0;
  private readonly config: ViewerConfig;
  private readonly logger: Logger;

  constructor(opts: { config: ViewerConfig; logger: Logger }) {
    this.config = opts.config;
    this.logger = opts.logger;
  }

  setDataset(items: readonly T[], adapter: ItemAdapter<T>): void {
    this.items = items;
    this.adapter = adapter;
    this.datasetChanged();
  }

  datasetChanged(): void {
    this.extrema = this.adapter ? computeExtrema(this.items, this.adapter) : EMPTY_EXTREMA;
    this.logger.debug("Dataset changed", { size: this.items.length });
    this.recomputeBaseScale();
  }

  resize(width: number, height: number): void {
    this.viewportWidth = Math.max(0, Math.trunc(width));
    this.viewportHeight = Math.max(0, Math.trunc(height));
    this.recomputeBaseScale();
  }

  isEmpty(): boolean {
    return this.adapter === null || this.items.length === 0;
  }

  size(): number {
    return this.isEmpty() ? 0 : this.items.length;
  }

  getItems(): readonly T[] {
    return this.items;
  }

  getAdapter(): ItemAdapter<T> | null {
    return this.adapter;
  }

  getExtrema(): BoundingExtrema {
    return this.extrema;
  }

  getBaseScale(): number {
    return this.baseScale;
  }

  getViewport(): { width: number; height: number } {
    return { width: this.viewportWidth, height: this.viewportHeight };
  }

  private recomputeBaseScale(): void {
    this.baseScale = computeBaseScale(
      this.extrema,
      !this.isEmpty(),
      this.viewportWidth,
      this.viewportHeight,
      this.config,
    );
    this.logger.debug("Base scale recomputed", {
      baseScale: this.baseScale,
      viewportWidth: this.viewportWidth,
      viewportHeight: this.viewportHeight,
    });
  }
}
