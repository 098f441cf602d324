import type { WorkspaceView } from "./WorkspaceView.js";

export interface Ticket {
  readonly file: string | null;
  readonly generation: number;
}

export type Publication<T> =
  | { status: "ok"; value: T; generation: number }
  | { status: "stale"; dispatched: number; current: number };

/** What the gate needs from the workspace. */
export interface GenerationSource {
  readonly generation: number;
  snapshot(): WorkspaceView;
}

/**
 * Ties a read-only request to the generation of the model it reads. Results
 * are discarded once the workspace has left that generation, which includes
 * a cancelled cycle that bumped the counter without committing a model.
 */
export class RequestGate {
  constructor(private readonly source: GenerationSource) {}

  dispatch(file: string | null = null): Ticket {
    return { file, generation: this.source.snapshot().generation };
  }

  publish<T>(ticket: Ticket, value: T): Publication<T> {
    const current = this.source.generation;
    if (current !== ticket.generation) {
      return { status: "stale", dispatched: ticket.generation, current };
    }
    return { status: "ok", value, generation: current };
  }

  run<T>(file: string | null, compute: (view: WorkspaceView) => T): Publication<T> {
    const view = this.source.snapshot();
    return this.publish({ file, generation: view.generation }, compute(view));
  }
}
