import type { ItemAdapter } from "../types";
import { PointCloudViewer, type PickResult } from "./PointCloudViewer";
import { InputNormalizer, type WheelDeltaMode } from "./input/InputNormalizer";
import type { InputPointerType, ViewerInputEvent } from "./input/InputEventTypes";
import { CanvasSurface } from "./surface/CanvasSurface";
import type { Logger } from "./types/contracts";
import type { CameraState, ViewerConfig } from "./types/camera";

type Handlers<T> = {
  onSelect?: (hit: PickResult<T> | null) => void;
  onHover?: (hit: PickResult<T> | null) => void;
};

export interface CreatePointCloudViewerOptions<T> extends Handlers<T> {
  container: HTMLElement;
  items?: readonly T[];
  adapter?: ItemAdapter<T>;
  camera?: Partial<CameraState>;
  config?: Partial<ViewerConfig>;
  logger?: Logger;
}

function pointerTypeOf(ev: PointerEvent): InputPointerType {
  return ev.pointerType === "mouse" || ev.pointerType === "touch" || ev.pointerType === "pen"
    ? ev.pointerType
    : "mouse";
}

function wheelDeltaModeOf(ev: WheelEvent): WheelDeltaMode {
  return ev.deltaMode === 1 || ev.deltaMode === 2 ? ev.deltaMode : 0;
}

/**
 * Mounts a canvas in `container`, wires pointer, wheel, key and resize
 * events into a `PointCloudViewer`, and redraws on the next animation frame
 * whenever the viewer asks for it. Requests within a frame coalesce.
 */
export function createPointCloudViewer<T>({
  container,
  items,
  adapter,
  camera,
  config,
  logger,
  onSelect,
  onHover,
}: CreatePointCloudViewerOptions<T>) {
  let handlers: Handlers<T> = { onSelect, onHover };
  let raf = 0;
  let disposed = false;
  let hoveredIndex: number | null = null;

  const canvas = document.createElement("canvas");
  canvas.style.display = "block";
  canvas.style.width = "100%";
  canvas.style.height = "100%";
  canvas.style.touchAction = "none";
  canvas.tabIndex = 0;
  container.appendChild(canvas);

  const ctx = canvas.getContext("2d");
  if (!ctx) {
    container.removeChild(canvas);
    throw new Error("2D canvas context is not available");
  }
  const surface = new CanvasSurface(ctx);
  const input = new InputNormalizer({ zoomStep: config?.zoomStep });

  const viewer = new PointCloudViewer<T>({
    items,
    adapter,
    camera,
    config,
    logger,
    width: container.clientWidth,
    height: container.clientHeight,
    requestRedraw: () => requestRedraw(),
  });

  function draw(): void {
    raf = 0;
    if (disposed) return;
    const { width, height } = viewer.getViewport();
    const pixelRatio = Math.min(window.devicePixelRatio || 1, 2);
    const pixelWidth = Math.max(1, Math.round(width * pixelRatio));
    const pixelHeight = Math.max(1, Math.round(height * pixelRatio));
    if (canvas.width !== pixelWidth) canvas.width = pixelWidth;
    if (canvas.height !== pixelHeight) canvas.height = pixelHeight;
    surface.beginFrame(width, height, pixelRatio, viewer.config.backgroundColor);
    viewer.render(surface);
  }

  function requestRedraw(): void {
    if (disposed || raf) return;
    raf = requestAnimationFrame(draw);
  }

  function handleEvents(events: ViewerInputEvent[]): void {
    for (const e of events) {
      const hit = viewer.applyInput(e);
      if (e.type === "tap") handlers.onSelect?.(hit);
    }
  }

  function sample(ev: PointerEvent) {
    const rect = canvas.getBoundingClientRect();
    return {
      id: ev.pointerId,
      x: ev.clientX - rect.left,
      y: ev.clientY - rect.top,
      pointer: pointerTypeOf(ev),
    };
  }

  function onPointerDown(ev: PointerEvent): void {
    if (ev.pointerType === "mouse" && ev.button !== 0) return;
    canvas.focus();
    canvas.setPointerCapture(ev.pointerId);
    handleEvents(input.onPointerDown(sample(ev)));
  }

  function onPointerMove(ev: PointerEvent): void {
    const s = sample(ev);
    handleEvents(input.onPointerMove(s));
    if (input.isDragging() || !handlers.onHover) return;
    const hit = viewer.pickAt(s.x, s.y);
    const index = hit?.index ?? null;
    if (index !== hoveredIndex) {
      hoveredIndex = index;
      handlers.onHover(hit);
    }
  }

  function onPointerUp(ev: PointerEvent): void {
    if (canvas.hasPointerCapture(ev.pointerId)) {
      canvas.releasePointerCapture(ev.pointerId);
    }
    handleEvents(input.onPointerUp(sample(ev)));
  }

  function onWheel(ev: WheelEvent): void {
    ev.preventDefault();
    handleEvents(input.onWheel(ev.deltaY, wheelDeltaModeOf(ev)));
  }

  function onKeyDown(ev: KeyboardEvent): void {
    const events = input.onKey(ev.key);
    if (events.length === 0) return;
    ev.preventDefault();
    handleEvents(events);
  }

  const resizeObserver = new ResizeObserver((entries) => {
    for (const entry of entries) {
      const { width, height } = entry.contentRect;
      handleEvents([{ type: "resize", width, height }]);
    }
  });

  canvas.addEventListener("pointerdown", onPointerDown);
  canvas.addEventListener("pointermove", onPointerMove);
  canvas.addEventListener("pointerup", onPointerUp);
  canvas.addEventListener("pointercancel", onPointerUp);
  canvas.addEventListener("wheel", onWheel, { passive: false });
  canvas.addEventListener("keydown", onKeyDown);
  resizeObserver.observe(container);
  requestRedraw();

  return {
    viewer,
    canvas,
    setDataset(nextItems: readonly T[], nextAdapter: ItemAdapter<T>): void {
      hoveredIndex = null;
      viewer.setDataset(nextItems, nextAdapter);
    },
    datasetChanged(): void {
      viewer.datasetChanged();
    },
    togglePerspective(): void {
      viewer.togglePerspective();
    },
    isPerspectiveEnabled(): boolean {
      return viewer.isPerspectiveEnabled();
    },
    resetView(): void {
      viewer.resetView();
    },
    setHandlers(next: Handlers<T>): void {
      handlers = next;
    },
    requestRedraw,
    dispose(): void {
      disposed = true;
      if (raf) cancelAnimationFrame(raf);
      raf = 0;
      resizeObserver.disconnect();
      canvas.removeEventListener("pointerdown", onPointerDown);
      canvas.removeEventListener("pointermove", onPointerMove);
      canvas.removeEventListener("pointerup", onPointerUp);
      canvas.removeEventListener("pointercancel", onPointerUp);
      canvas.removeEventListener("wheel", onWheel);
      canvas.removeEventListener("keydown", onKeyDown);
      viewer.dispose();
      if (canvas.parentElement === container) {
        container.removeChild(canvas);
      }
    },
  };
}

export type PointCloudViewerHandle<T> = ReturnType<typeof createPointCloudViewer<T>>;
