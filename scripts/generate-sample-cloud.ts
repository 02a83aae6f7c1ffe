import fs from "fs";
import path from "path";
import { parseArgs } from "util";
import { generateSampleCloud, type SampleShape } from "../src/generateSampleCloud";

const SHAPES: readonly SampleShape[] = ["clusters", "helix", "cube"];

function isShape(v: string): v is SampleShape {
    return SHAPES.some((s) => s === v);
}

async function main() {
    const { values } = parseArgs({
        options: {
            shape: { type: "string", default: "clusters" },
            count: { type: "string", default: "400" },
            seed: { type: "string", default: "pointcloud-sample-v1" },
            scale: { type: "string", default: "10" },
            labels: { type: "string", default: "0" },
            out: { type: "string", default: "sample-cloud.json" },
        },
    });

    const shape = values.shape ?? "clusters";
    if (!isShape(shape)) {
        throw new Error(`Unknown shape "${shape}", expected one of ${SHAPES.join(", ")}`);
    }

    const cloud = generateSampleCloud({
        shape,
        count: Number(values.count),
        seed: values.seed,
        scale: Number(values.scale),
        labelEvery: Number(values.labels),
    });

    const outPath = path.resolve(process.cwd(), values.out ?? "sample-cloud.json");
    fs.writeFileSync(outPath, JSON.stringify(cloud, null, 2));
    console.log(`Generated ${cloud.length} ${shape} points.`);
    console.log(`Written to ${outPath}`);
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
