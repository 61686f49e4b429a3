import type { RenderMode, RenderReply, StepInfo } from "@tradegym/schemas";
import type { EngineRun } from "./IEngine";
import type { RawState } from "./IStrategy";

export interface StepSnapshot {
  raw: RawState;
  state: unknown;
  reward: number;
  done: boolean;
  info: StepInfo[];
}

export interface IRenderer {
  readonly enabled: boolean;
  readonly renderModes: readonly string[];
  initialize(): void;
  render(mode: RenderMode, stepToRender?: StepSnapshot | null): RenderReply;
  captureEpisode(run: EngineRun): void;
}
