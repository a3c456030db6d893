import type { PendingEvent } from './types.js';

interface UndoStep {
  label: string;
  revert: () => void;
}

/**
 * Settlement order of collaborator calls. Pulls run before anything leaves
 * custody, so the usual failure (a payer without balance or allowance) aborts
 * before an outbound movement needs reversing.
 */
export enum InteractionPhase {
  Pull = 0,
  Burn = 1,
  Mint = 2,
  Push = 3
}

export interface Interaction {
  phase: InteractionPhase;
  label: string;
  /** Perform the call; throw on failure. */
  execute: () => void;
  /** Reverse a completed call; throw if the collaborator refuses. */
  compensate: () => void;
}

export interface RollbackReport {
  steps: number;
  failed: Array<{ label: string; error: unknown }>;
}

/**
 * Journal for a single engine operation. Ledger effects register their
 * inverse as they happen; collaborator calls are queued and only run in
 * settle(), after every check has passed. Events wait here until commit.
 */
export class UnitOfWork {
  private readonly undo: UndoStep[] = [];
  private readonly interactions: Interaction[] = [];
  private readonly events: PendingEvent[] = [];
  private closed = false;

  constructor(readonly operation: string) {}

  get size(): number {
    return this.undo.length;
  }

  get pendingInteractions(): number {
    return this.interactions.length;
  }

  record(label: string, revert: () => void): void {
    this.assertOpen();
    this.undo.push({ label, revert });
  }

  schedule(interaction: Interaction): void {
    this.assertOpen();
    this.interactions.push(interaction);
  }

  raise(event: PendingEvent): void {
    this.assertOpen();
    this.events.push(event);
  }

  /**
   * Run queued collaborator calls by phase, keeping schedule order within a
   * phase. Each completed call journals its compensation.
   */
  settle(): void {
    this.assertOpen();
    const queue = this.interactions
      .map((interaction, order) => ({ interaction, order }))
      .sort((a, b) => a.interaction.phase - b.interaction.phase || a.order - b.order);
    this.interactions.length = 0;

    for (const { interaction } of queue) {
      interaction.execute();
      this.record(interaction.label, interaction.compensate);
    }
  }

  /** Close the journal and hand back the buffered events in raise order. */
  commit(): PendingEvent[] {
    this.assertOpen();
    if (this.interactions.length > 0) {
      throw new Error(`Unit of work for ${this.operation} has unsettled interactions`);
    }
    this.closed = true;
    this.undo.length = 0;
    return this.events.splice(0);
  }

  /**
   * Revert every recorded effect, newest first. A failing step does not stop
   * the remaining ones; failures are reported to the caller.
   */
  rollback(): RollbackReport {
    this.assertOpen();
    this.closed = true;
    this.events.length = 0;
    this.interactions.length = 0;

    const report: RollbackReport = { steps: this.undo.length, failed: [] };
    let step = this.undo.pop();
    while (step !== undefined) {
      try {
        step.revert();
      } catch (error) {
        report.failed.push({ label: step.label, error });
      }
      step = this.undo.pop();
    }
    return report;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`Unit of work for ${this.operation} is already closed`);
    }
  }
}
