import type { BoundingExtrema, Point3D } from "../types";

export const ORIGIN: Point3D = Object.freeze({ x: 0, y: 0, z: 0 });

export function point3D(x: number, y: number, z: number): Point3D {
    return { x, y, z };
}

export function midpoint(a: Point3D, b: Point3D): Point3D {
    return {
        x: (a.x + b.x) / 2.0,
        y: (a.y + b.y) / 2.0,
        z: (a.z + b.z) / 2.0,
    };
}

export function componentMin(a: Point3D, b: Point3D): Point3D {
    return { x: Math.min(a.x, b.x), y: Math.min(a.y, b.y), z: Math.min(a.z, b.z) };
}

export function componentMax(a: Point3D, b: Point3D): Point3D {
    return { x: Math.max(a.x, b.x), y: Math.max(a.y, b.y), z: Math.max(a.z, b.z) };
}

export function createExtrema(mins: Point3D, maxs: Point3D): BoundingExtrema {
    return { mins, maxs, mids: midpoint(mins, maxs) };
}

export function maxRange(extrema: BoundingExtrema): number {
    const { mins, maxs } = extrema;
    return Math.max(maxs.x - mins.x, maxs.y - mins.y, maxs.z - mins.z);
}

/**
 * Corners of the box, bit 0 picking x, bit 1 y and bit 2 z
 * (a set bit takes the max side).
 */
export function boxCorners(extrema: BoundingExtrema): Point3D[] {
    const { mins, maxs } = extrema;
    const corners: Point3D[] = [];
    for (let i = 0; i < 8; i++) {
        corners.push({
            x: i & 1 ? maxs.x : mins.x,
            y: i & 2 ? maxs.y : mins.y,
            z: i & 4 ? maxs.z : mins.z,
        });
    }
    return corners;
}
