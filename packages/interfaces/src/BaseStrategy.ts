import type { StepInfo } from "@tradegym/schemas";
import type { IStrategy, RawState, StrategyParams } from "./IStrategy";

export abstract class BaseStrategy implements IStrategy {
  public id: string;
  public action = "hold";
  public lastAction = "hold";
  public brokerMessage = "-";
  public doneReason = "-";
  public iteration = 0;
  public lastReward = 0;
  protected params: StrategyParams;

  constructor(id: string, params: StrategyParams) {
    this.id = id;
    this.params = params;
  }

  next(iteration: number): void {
    this.iteration = iteration;
    this.onBar();
  }

  protected abstract onBar(): void;
  abstract getDone(): boolean;
  abstract getInfo(): StepInfo;
  abstract getRawState(): RawState;
  abstract getState(): unknown;
  abstract getReward(): number;
  abstract close(): void;
}
