import type { EngineRun, IRenderer, StepSnapshot } from "@tradegym/interfaces";
import type { RenderMode, RenderPayload, RenderReply } from "@tradegym/schemas";

export const RENDER_MODES = ["human", "agent", "episode"] as const;

export type SummaryRendererOptions = {
  enabled?: boolean;
  modes?: readonly string[];
};

function fmt(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(4);
}

/** Text renderer: each mode yields a title plus printable lines. */
export class SummaryRenderer implements IRenderer {
  readonly enabled: boolean;
  readonly renderModes: readonly string[];
  private last = new Map<string, RenderPayload>();

  constructor(options: SummaryRendererOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.renderModes = options.modes ?? RENDER_MODES;
  }

  initialize(): void {
    this.last.clear();
  }

  render(mode: RenderMode, stepToRender: StepSnapshot | null = null): RenderReply {
    const modes = typeof mode === "string" ? [mode] : mode;
    const reply: RenderReply = {};
    for (const m of modes) reply[m] = this.renderOne(m, stepToRender);
    return reply;
  }

  captureEpisode(run: EngineRun): void {
    if (!this.enabled || !this.renderModes.includes("episode")) return;
    const lines = [`final_value: ${fmt(run.finalValue)}`, `stop_reason: ${run.stopReason}`];
    for (const [name, analysis] of Object.entries(run.analyses)) lines.push(`${name}: ${JSON.stringify(analysis)}`);
    for (const [observer, series] of Object.entries(run.lines)) {
      for (const [line, values] of Object.entries(series)) {
        if (values.length) lines.push(`${observer}.${line}: last=${fmt(values[values.length - 1])}`);
      }
    }
    this.last.set("episode", { mode: "episode", title: `episode of ${run.length} bars`, lines });
  }

  private renderOne(mode: string, step: StepSnapshot | null): RenderPayload {
    if (!this.enabled) return { mode, title: "rendering disabled", lines: [] };
    if (!this.renderModes.includes(mode)) {
      return { mode, title: `unsupported mode <${mode}>`, lines: [`supported: ${this.renderModes.join(", ")}`] };
    }
    if (mode === "episode" || !step) {
      return this.last.get(mode) ?? { mode, title: `nothing to render for <${mode}> yet`, lines: [] };
    }
    const payload = mode === "human" ? this.human(step) : this.agent(step);
    this.last.set(mode, payload);
    return payload;
  }

  private human(step: StepSnapshot): RenderPayload {
    const last = step.info[step.info.length - 1] ?? {};
    const lines = step.raw.map((r) => r.map(fmt).join(" "));
    lines.push(`reward: ${fmt(step.reward)} done: ${step.done}`);
    for (const [k, v] of Object.entries(last)) lines.push(`${k}: ${String(v)}`);
    return { mode: "human", title: "price window [open high low close]", lines };
  }

  private agent(step: StepSnapshot): RenderPayload {
    return { mode: "agent", title: "agent observation", lines: [JSON.stringify(step.state), `reward: ${fmt(step.reward)}`] };
  }
}
