import type { PipelineStage } from "@testforge/shared";
import type { Logger } from "../logger";

export class InvalidStageTransitionError extends Error {
  constructor(from: PipelineStage, to: PipelineStage) {
    super(`Invalid pipeline stage transition: ${from} -> ${to}`);
    this.name = "InvalidStageTransitionError";
  }
}

const ALLOWED_TRANSITIONS: Record<PipelineStage, PipelineStage[]> = {
  normalizing: ["prompting", "failed"],
  prompting: ["invoking", "failed"],
  invoking: ["validating", "failed"],
  validating: ["rendering", "failed"],
  rendering: ["done", "failed"],
  done: [],
  failed: [],
};

export function assertCanMoveStage(from: PipelineStage, to: PipelineStage) {
  if (!ALLOWED_TRANSITIONS[from].includes(to)) {
    throw new InvalidStageTransitionError(from, to);
  }
}

/**
 * Stage tracker for one generation run. Moves forward only; `done` and
 * `failed` are terminal.
 */
export class PipelineRun {
  private current: PipelineStage = "normalizing";
  private readonly history: PipelineStage[] = ["normalizing"];

  constructor(
    readonly requestId: string,
    private readonly logger: Logger
  ) {}

  get stage(): PipelineStage {
    return this.current;
  }

  get stages(): PipelineStage[] {
    return [...this.history];
  }

  get isTerminal() {
    return ALLOWED_TRANSITIONS[this.current].length === 0;
  }

  moveTo(next: PipelineStage) {
    assertCanMoveStage(this.current, next);
    this.logger.debug({ from: this.current, to: next }, "Stage transition");
    this.current = next;
    this.history.push(next);
  }

  fail(reason: string) {
    if (this.isTerminal) {
      return;
    }
    this.logger.debug({ from: this.current, to: "failed", reason }, "Stage transition");
    this.current = "failed";
    this.history.push("failed");
  }
}
