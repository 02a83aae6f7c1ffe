import type { ViewerLayer } from "../types/contracts";

function compareRenderOrder(a: ViewerLayer, b: ViewerLayer): number {
  if (a.renderOrder !== b.renderOrder) return a.renderOrder - b.renderOrder;
  return a.id.localeCompare(b.id);
}

export class LayerScheduler {
  private readonly byId = new Map<string, ViewerLayer>();
  private renderList: ViewerLayer[] = [];

  register(layer: ViewerLayer): void {
    if (this.byId.has(layer.id)) {
      throw new Error(`Duplicate layer id: ${layer.id}`);
    }
    this.byId.set(layer.id, layer);
    this.rebuild();
  }

  unregister(id: string): boolean {
    const removed = this.byId.delete(id);
    if (removed) this.rebuild();
    return removed;
  }

  get(id: string): ViewerLayer | undefined {
    return this.byId.get(id);
  }

  getRenderLayers(): readonly ViewerLayer[] {
    return this.renderList;
  }

  getLayerCount(): number {
    return this.byId.size;
  }

  private rebuild(): void {
    this.renderList = [...this.byId.values()].sort(compareRenderOrder);
  }
}
