export type Point3D = {
    readonly x: number;
    readonly y: number;
    readonly z: number;
};

// 0..255 per channel
export type RGBColor = {
    readonly r: number;
    readonly g: number;
    readonly b: number;
};

/**
 * Capability set that turns an opaque item collection into renderable data.
 * The viewer never looks inside `T`; everything it draws comes through here.
 *
 * Index accessors are only called with `0 <= index < items.length`.
 * `getMin`/`getMax` must be per-axis extrema over the whole collection;
 * they are trusted as-is.
 */
export interface ItemAdapter<T> {
    getItem(items: readonly T[], index: number): Point3D;
    getColor(items: readonly T[], index: number): RGBColor;
    /** `null`, `undefined` or blank text means no label is drawn. */
    getLabel(items: readonly T[], index: number): string | null | undefined;
    getMin(items: readonly T[]): Point3D;
    getMax(items: readonly T[]): Point3D;
}

export type BoundingExtrema = {
    readonly mins: Point3D;
    readonly maxs: Point3D;
    // projection origin
    readonly mids: Point3D;
};

export type PointRecord = {
    x: number;
    y: number;
    z: number;
    color?: RGBColor | string;
    label?: string;
};
