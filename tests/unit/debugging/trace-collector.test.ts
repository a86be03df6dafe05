import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TraceCollector } from '../../../src/debugging/trace-collector.js';
import type { TraceEntry } from '../../../src/debugging/types.js';
import type { Logger } from '../../../src/utils/logger.js';

describe('TraceCollector', () => {
  let collector: TraceCollector;

  beforeEach(() => {
    collector = new TraceCollector();
  });

  it('stamps ids, sequence and the current cycle', () => {
    collector.record('query_started', {});
    collector.setCycle(1);
    const entry = collector.record('rule_activated', { activationId: 'A0001' }, 'R1');

    expect(entry).toEqual({
      id: 'T0002',
      sequence: 2,
      type: 'rule_activated',
      cycle: 1,
      details: { activationId: 'A0001' },
      ruleId: 'R1'
    });
    expect(collector.cycle).toBe(1);
    expect(collector.size).toBe(2);
  });

  it('omits ruleId when not given', () => {
    expect('ruleId' in collector.record('query_started', {})).toBe(false);
  });

  it('indexes by rule, type and cycle', () => {
    collector.record('query_started', {});
    collector.setCycle(1);
    collector.record('rule_activated', {}, 'R1');
    collector.record('rule_activated', {}, 'R2');
    collector.setCycle(2);
    collector.record('action_executed', {}, 'R1');

    expect(collector.getByRule('R1').map(e => e.id)).toEqual(['T0002', 'T0004']);
    expect(collector.getByType('rule_activated').map(e => e.ruleId)).toEqual(['R1', 'R2']);
    expect(collector.getByCycle(0).map(e => e.type)).toEqual(['query_started']);
    expect(collector.getByRule('R9')).toEqual([]);
  });

  it('combines query filters', () => {
    collector.setCycle(1);
    collector.record('rule_activated', {}, 'R1');
    collector.record('action_executed', {}, 'R1');
    collector.setCycle(2);
    collector.record('rule_activated', {}, 'R1');
    collector.record('rule_activated', {}, 'R2');

    expect(collector.query({ ruleId: 'R1', types: ['rule_activated'] }).map(e => e.id)).toEqual(['T0001', 'T0003']);
    expect(collector.query({ cycle: 2, types: ['rule_activated'] }).map(e => e.ruleId)).toEqual(['R1', 'R2']);
    expect(collector.query({ types: ['rule_activated', 'action_executed'], limit: 2 }).map(e => e.id)).toEqual(['T0003', 'T0004']);
  });

  it('notifies subscribers until they unsubscribe', () => {
    const seen: TraceEntry[] = [];
    const unsubscribe = collector.subscribe(entry => seen.push(entry));

    collector.record('query_started', {});
    unsubscribe();
    collector.record('query_finished', {});

    expect(seen.map(e => e.type)).toEqual(['query_started']);
  });

  it('logs failing subscribers and keeps recording', () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const guarded = new TraceCollector(logger);
    guarded.subscribe(() => {
      throw new Error('listener down');
    });

    guarded.record('query_started', {});

    expect(logger.error).toHaveBeenCalledWith('Trace subscriber failed: listener down');
    expect(guarded.size).toBe(1);
  });

  it('reset drops entries and restarts numbering', () => {
    collector.setCycle(3);
    collector.record('query_started', {});
    collector.reset();

    expect(collector.getAll()).toEqual([]);
    expect(collector.cycle).toBe(0);
    expect(collector.record('query_started', {}).id).toBe('T0001');
  });
});
