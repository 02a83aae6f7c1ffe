import type { InputPointerType, ViewerInputEvent } from "./InputEventTypes";
import { DEFAULT_INPUT_CONFIG, DEFAULT_VIEWER_CONFIG } from "../config/defaults";

export interface PointerSample {
  id: number;
  x: number;
  y: number;
  pointer: InputPointerType;
}

// Mirrors WheelEvent.deltaMode.
export type WheelDeltaMode = 0 | 1 | 2;

export interface InputNormalizerOptions {
  zoomStep?: number;
  tapMoveThresholdPx?: number;
  wheelPixelsPerNotch?: number;
  wheelLinesPerNotch?: number;
}

/**
 * Turns raw pointer and wheel samples into viewer events. A single held
 * pointer rotates; two pointers pinch-zoom.
 */
export class InputNormalizer {
  private readonly pointers = new Map<number, PointerSample>();
  private primaryPointerId: number | null = null;
  private primaryDown: PointerSample | null = null;
  private lastPrimary: PointerSample | null = null;
  private pinchDistance: number | null = null;
  private draggedSincePrimaryDown = false;

  private readonly zoomStep: number;
  private readonly tapMoveThresholdPx: number;
  private readonly wheelPixelsPerNotch: number;
  private readonly wheelLinesPerNotch: number;

  constructor(options: InputNormalizerOptions = {}) {
    this.zoomStep = options.zoomStep ?? DEFAULT_VIEWER_CONFIG.zoomStep;
    this.tapMoveThresholdPx = options.tapMoveThresholdPx ?? DEFAULT_INPUT_CONFIG.tapMoveThresholdPx;
    this.wheelPixelsPerNotch = options.wheelPixelsPerNotch ?? DEFAULT_INPUT_CONFIG.wheelPixelsPerNotch;
    this.wheelLinesPerNotch = options.wheelLinesPerNotch ?? DEFAULT_INPUT_CONFIG.wheelLinesPerNotch;
  }

  isDragging(): boolean {
    return this.primaryPointerId !== null;
  }

  onPointerDown(sample: PointerSample): ViewerInputEvent[] {
    this.pointers.set(sample.id, sample);
    if (this.pointers.size === 1) {
      this.primaryPointerId = sample.id;
      this.primaryDown = sample;
      this.lastPrimary = sample;
      this.draggedSincePrimaryDown = false;
      this.pinchDistance = null;
      return [];
    }
    this.primaryPointerId = null;
    this.lastPrimary = null;
    this.pinchDistance = this.getPinchDistance();
    this.draggedSincePrimaryDown = true;
    return [];
  }

  onPointerMove(sample: PointerSample): ViewerInputEvent[] {
    // Hover without a press never rotates.
    if (!this.pointers.has(sample.id)) return [];
    this.pointers.set(sample.id, sample);

    if (this.pointers.size === 1 && this.primaryPointerId === sample.id) {
      if (!this.lastPrimary) {
        this.lastPrimary = sample;
        return [];
      }
      const dx = sample.x - this.lastPrimary.x;
      const dy = sample.y - this.lastPrimary.y;
      this.lastPrimary = sample;
      if (this.primaryDown) {
        const moved =
          Math.hypot(sample.x - this.primaryDown.x, sample.y - this.primaryDown.y) >= this.tapMoveThresholdPx;
        if (moved) this.draggedSincePrimaryDown = true;
      }
      if (dx === 0 && dy === 0) return [];
      return [{ type: "rotate", deltaX: dx, deltaY: dy, pointer: sample.pointer }];
    }

    if (this.pointers.size >= 2) {
      const d = this.getPinchDistance();
      if (d === null) return [];
      if (this.pinchDistance === null || this.pinchDistance <= 0) {
        this.pinchDistance = d;
        return [];
      }
      let ratio = d / this.pinchDistance;
      this.pinchDistance = d;
      if (!Number.isFinite(ratio) || ratio <= 0 || ratio === 1) return [];
      ratio = Math.min(DEFAULT_INPUT_CONFIG.maxPinchRatio, Math.max(DEFAULT_INPUT_CONFIG.minPinchRatio, ratio));
      // Same multiplier the wheel would apply: zoom *= 1 - n * step.
      return [{ type: "zoom", notches: (1 - ratio) / this.zoomStep, pointer: sample.pointer }];
    }

    return [];
  }

  onPointerUp(sample: PointerSample): ViewerInputEvent[] {
    const released = this.pointers.get(sample.id);
    if (!released) return [];
    const wasPrimary = this.primaryPointerId === sample.id;
    this.pointers.delete(sample.id);

    if (this.pointers.size === 0) {
      const shouldTap = wasPrimary && !this.draggedSincePrimaryDown;
      this.primaryPointerId = null;
      this.primaryDown = null;
      this.lastPrimary = null;
      this.pinchDistance = null;
      this.draggedSincePrimaryDown = false;
      if (!shouldTap) return [];
      return [{ type: "tap", x: released.x, y: released.y, pointer: released.pointer }];
    }

    if (this.pointers.size === 1) {
      const [remaining] = this.pointers.values();
      this.primaryPointerId = remaining.id;
      this.primaryDown = remaining;
      this.lastPrimary = remaining;
      this.pinchDistance = null;
      this.draggedSincePrimaryDown = true;
      return [];
    }

    this.pinchDistance = this.getPinchDistance();
    return [];
  }

  onWheel(deltaY: number, deltaMode: WheelDeltaMode = 0): ViewerInputEvent[] {
    if (deltaY === 0 || !Number.isFinite(deltaY)) return [];
    let notches = deltaY;
    if (deltaMode === 0) notches = deltaY / this.wheelPixelsPerNotch;
    else if (deltaMode === 1) notches = deltaY / this.wheelLinesPerNotch;
    return [{ type: "zoom", notches, pointer: "mouse" }];
  }

  onKey(key: string): ViewerInputEvent[] {
    switch (key.toLowerCase()) {
      case "p":
        return [{ type: "togglePerspective" }];
      case "r":
        return [{ type: "resetView" }];
      default:
        return [];
    }
  }

  private getPinchDistance(): number | null {
    const points = [...this.pointers.values()];
    if (points.length < 2) return null;
    const [a, b] = points;
    return Math.hypot(a.x - b.x, a.y - b.y);
  }
}
