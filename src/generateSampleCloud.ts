import seedrandom from "seedrandom";
import type { PointRecord } from "./types";

export type SampleShape = "clusters" | "helix" | "cube";

export interface SampleCloudOptions {
    shape: SampleShape;
    count: number;
    seed: string;
    scale: number; // half-extent of the cloud in model units
    clusters: number;
    labelEvery: number; // 0 = no labels
}

export const defaultSampleCloudOptions: SampleCloudOptions = {
    shape: "clusters",
    count: 400,
    seed: "pointcloud-sample-v1",
    scale: 10,
    clusters: 4,
    labelEvery: 0,
};

const PALETTE = ["#e6194b", "#3cb44b", "#ffe119", "#4363d8", "#f58231", "#911eb4", "#46f0f0", "#f032e6"];

// Box-Muller
function gaussian(rng: () => number): number {
    const u = Math.max(rng(), 1e-12);
    const v = rng();
    return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

export function generateSampleCloud(options: Partial<SampleCloudOptions> = {}): PointRecord[] {
    const opts = { ...defaultSampleCloudOptions, ...options };
    if (!Number.isInteger(opts.count) || opts.count < 0) {
        throw new RangeError(`count must be a non-negative integer, got ${opts.count}`);
    }
    if (!Number.isInteger(opts.clusters) || opts.clusters < 1) {
        throw new RangeError(`clusters must be a positive integer, got ${opts.clusters}`);
    }
    const rng = seedrandom(opts.seed);
    const s = opts.scale;
    const out: PointRecord[] = [];

    const centers = Array.from({ length: opts.clusters }, () => ({
        x: (rng() * 2 - 1) * s * 0.7,
        y: (rng() * 2 - 1) * s * 0.7,
        z: (rng() * 2 - 1) * s * 0.7,
    }));

    for (let i = 0; i < opts.count; i++) {
        let record: PointRecord;
        if (opts.shape === "helix") {
            const t = opts.count > 1 ? i / (opts.count - 1) : 0;
            const angle = t * Math.PI * 6;
            record = {
                x: Math.cos(angle) * s * 0.5,
                y: (t * 2 - 1) * s,
                z: Math.sin(angle) * s * 0.5,
                color: PALETTE[Math.floor(t * (PALETTE.length - 1))],
            };
        } else if (opts.shape === "cube") {
            record = {
                x: (rng() * 2 - 1) * s,
                y: (rng() * 2 - 1) * s,
                z: (rng() * 2 - 1) * s,
                color: PALETTE[i % PALETTE.length],
            };
        } else {
            const k = i % opts.clusters;
            const c = centers[k];
            const spread = s * 0.15;
            record = {
                x: c.x + gaussian(rng) * spread,
                y: c.y + gaussian(rng) * spread,
                z: c.z + gaussian(rng) * spread,
                color: PALETTE[k % PALETTE.length],
            };
        }
        if (opts.labelEvery > 0 && i % opts.labelEvery === 0) {
            record.label = `#${i}`;
        }
        out.push(record);
    }
    return out;
}
