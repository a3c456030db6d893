// Unit tests for UnitOfWork journaling and settlement
import { describe, it, expect } from 'vitest';

import { InteractionPhase, UnitOfWork } from '../../src/engine/UnitOfWork.js';

function interaction(log: string[], phase: InteractionPhase, label: string, fail = false) {
  return {
    phase,
    label,
    execute: () => {
      if (fail) throw new Error(`${label} failed`);
      log.push(`run ${label}`);
    },
    compensate: () => { log.push(`undo ${label}`); }
  };
}

describe('UnitOfWork', () => {
  it('should settle interactions by phase, keeping schedule order within a phase', () => {
    const log: string[] = [];
    const uow = new UnitOfWork('op');
    uow.schedule(interaction(log, InteractionPhase.Push, 'push-a'));
    uow.schedule(interaction(log, InteractionPhase.Mint, 'mint'));
    uow.schedule(interaction(log, InteractionPhase.Pull, 'pull-a'));
    uow.schedule(interaction(log, InteractionPhase.Push, 'push-b'));
    uow.schedule(interaction(log, InteractionPhase.Burn, 'burn'));
    uow.schedule(interaction(log, InteractionPhase.Pull, 'pull-b'));

    uow.settle();

    expect(log).toEqual(['run pull-a', 'run pull-b', 'run burn', 'run mint', 'run push-a', 'run push-b']);
    expect(uow.pendingInteractions).toBe(0);
    expect(uow.size).toBe(6);
  });

  it('should hand back events in raise order on commit', () => {
    const uow = new UnitOfWork('op');
    uow.raise({ name: 'DebtMinted', payload: { user: 'a', amount: 1n } });
    uow.raise({ name: 'CollateralDeposited', payload: { user: 'a', asset: 'weth', amount: 2n } });

    expect(uow.commit().map(e => e.name)).toEqual(['DebtMinted', 'CollateralDeposited']);
  });

  it('should refuse to commit with unsettled interactions', () => {
    const uow = new UnitOfWork('op');
    uow.schedule(interaction([], InteractionPhase.Pull, 'pull'));
    expect(() => uow.commit()).toThrow('Unit of work for op has unsettled interactions');
  });

  it('should unwind recorded steps newest first, including completed interactions', () => {
    const log: string[] = [];
    const uow = new UnitOfWork('op');
    uow.record('ledger-1', () => log.push('undo ledger-1'));
    uow.record('ledger-2', () => log.push('undo ledger-2'));
    uow.schedule(interaction(log, InteractionPhase.Pull, 'pull'));
    uow.schedule(interaction(log, InteractionPhase.Push, 'push', true));

    expect(() => uow.settle()).toThrow('push failed');
    const report = uow.rollback();

    expect(log).toEqual(['run pull', 'undo pull', 'undo ledger-2', 'undo ledger-1']);
    expect(report).toEqual({ steps: 3, failed: [] });
  });

  it('should keep unwinding past a failing step and report it', () => {
    const log: string[] = [];
    const uow = new UnitOfWork('op');
    const refusal = new Error('refused');
    uow.record('first', () => log.push('undo first'));
    uow.record('second', () => { throw refusal; });
    uow.record('third', () => log.push('undo third'));

    const report = uow.rollback();

    expect(log).toEqual(['undo third', 'undo first']);
    expect(report.failed).toEqual([{ label: 'second', error: refusal }]);
  });

  it('should drop buffered events on rollback and close the journal', () => {
    const uow = new UnitOfWork('op');
    uow.raise({ name: 'DebtMinted', payload: { user: 'a', amount: 1n } });
    uow.rollback();

    expect(() => uow.raise({ name: 'DebtMinted', payload: { user: 'a', amount: 1n } }))
      .toThrow('Unit of work for op is already closed');
    expect(() => uow.commit()).toThrow('already closed');
  });
});
