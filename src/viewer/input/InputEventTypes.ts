export type InputPointerType = "mouse" | "touch" | "pen";

export type ViewerInputEvent =
  | { type: "rotate"; deltaX: number; deltaY: number; pointer: InputPointerType }
  | { type: "zoom"; notches: number; pointer: InputPointerType }
  | { type: "tap"; x: number; y: number; pointer: InputPointerType }
  | { type: "togglePerspective" }
  | { type: "resetView" }
  | { type: "resize"; width: number; height: number };
