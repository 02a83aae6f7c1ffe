import type { ViewerInputEvent } from "../input/InputEventTypes";
import type { PickResult } from "../PointCloudViewer";

export interface InputReplayFrame {
  atMs: number;
  event: ViewerInputEvent;
}

export interface InputReplayScript {
  version: 1;
  name: string;
  frames: InputReplayFrame[];
}

/** Anything that consumes normalized input the way `PointCloudViewer` does. */
export interface ReplayTarget<T> {
  applyInput(event: ViewerInputEvent): PickResult<T> | null;
}

export interface ReplayOutcome<T> {
  applied: number;
  /** One entry per `tap` frame, in script order. */
  picks: Array<PickResult<T> | null>;
  /** Clock value at which the last frame was applied. */
  elapsedMs: number;
}

/**
 * Steps a recorded script against a target on a fixed clock. Every frame due
 * at a tick is applied before the clock advances.
 */
export class InputReplayPlayer<T> {
  private readonly script: InputReplayScript;
  private readonly target: ReplayTarget<T>;
  private index = 0;
  private picks: Array<PickResult<T> | null> = [];

  constructor(script: InputReplayScript, target: ReplayTarget<T>) {
    for (let i = 1; i < script.frames.length; i++) {
      if (script.frames[i].atMs < script.frames[i - 1].atMs) {
        throw new RangeError(`Replay "${script.name}" frame ${i} is out of time order`);
      }
    }
    this.script = script;
    this.target = target;
  }

  isFinished(): boolean {
    return this.index >= this.script.frames.length;
  }

  /** Applies every frame due at `elapsedMs`; returns how many were applied. */
  advanceTo(elapsedMs: number): number {
    const { frames } = this.script;
    const start = this.index;
    while (this.index < frames.length && frames[this.index].atMs <= elapsedMs) {
      const { event } = frames[this.index];
      const pick = this.target.applyInput(event);
      if (event.type === "tap") this.picks.push(pick);
      this.index += 1;
    }
    return this.index - start;
  }

  getPicks(): ReadonlyArray<PickResult<T> | null> {
    return this.picks;
  }

  rewind(): void {
    this.index = 0;
    this.picks = [];
  }
}

/** Runs a whole script on a `stepMs` clock. */
export function replay<T>(target: ReplayTarget<T>, script: InputReplayScript, stepMs = 16): ReplayOutcome<T> {
  if (!(stepMs > 0)) {
    throw new RangeError(`stepMs must be positive, got ${stepMs}`);
  }
  const player = new InputReplayPlayer(script, target);
  let elapsedMs = 0;
  let applied = player.advanceTo(elapsedMs);
  while (!player.isFinished()) {
    elapsedMs += stepMs;
    applied += player.advanceTo(elapsedMs);
  }
  return { applied, picks: [...player.getPicks()], elapsedMs };
}
