export * from "./viewer";
export { PointCloudView } from "./react/PointCloudView";
export type { PointCloudViewProps } from "./react/PointCloudView";
export type { BoundingExtrema, ItemAdapter, Point3D, PointRecord, RGBColor } from "./types";

export { createItemAdapter, pointRecordAdapter, resolveColor } from "./adapters/records";
export type { ItemAccessors } from "./adapters/records";
export { point3D, midpoint, boxCorners, ORIGIN } from "./geometry/point";
export { generateSampleCloud, defaultSampleCloudOptions } from "./generateSampleCloud";
export type { SampleCloudOptions, SampleShape } from "./generateSampleCloud";
