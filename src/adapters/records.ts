import type { ItemAdapter, Point3D, PointRecord, RGBColor } from "../types";
import { componentMax, componentMin, ORIGIN } from "../geometry/point";
import { DEFAULT_POINT_COLOR } from "../viewer/config/defaults";
import { parseColor } from "../viewer/surface/colors";

export type ItemAccessors<T> = {
    position: (item: T, index: number) => Point3D;
    color?: (item: T, index: number) => RGBColor;
    label?: (item: T, index: number) => string | null | undefined;
};

function scanBounds<T>(items: readonly T[], position: ItemAccessors<T>["position"]): { min: Point3D; max: Point3D } {
    if (items.length === 0) return { min: ORIGIN, max: ORIGIN };
    let min = position(items[0], 0);
    let max = min;
    for (let i = 1; i < items.length; i++) {
        const p = position(items[i], i);
        min = componentMin(min, p);
        max = componentMax(max, p);
    }
    return { min, max };
}

/**
 * Builds an adapter from per-item accessors. Extrema come from a full scan
 * of the positions, so they are always consistent with `getItem`.
 */
export function createItemAdapter<T>(accessors: ItemAccessors<T>): ItemAdapter<T> {
    const { position, color, label } = accessors;
    return {
        getItem: (items, index) => position(items[index], index),
        getColor: (items, index) => (color ? color(items[index], index) : DEFAULT_POINT_COLOR),
        getLabel: (items, index) => (label ? label(items[index], index) : null),
        getMin: (items) => scanBounds(items, position).min,
        getMax: (items) => scanBounds(items, position).max,
    };
}

// Parsing CSS colors through three is not free; cache per style string.
const colorCache = new Map<string, RGBColor>();

export function resolveColor(color: PointRecord["color"]): RGBColor {
    if (color === undefined) return DEFAULT_POINT_COLOR;
    if (typeof color !== "string") return color;
    let parsed = colorCache.get(color);
    if (!parsed) {
        parsed = parseColor(color);
        colorCache.set(color, parsed);
    }
    return parsed;
}

export const pointRecordAdapter: ItemAdapter<PointRecord> = createItemAdapter<PointRecord>({
    position: (r) => ({ x: r.x, y: r.y, z: r.z }),
    color: (r) => resolveColor(r.color),
    label: (r) => r.label,
});
