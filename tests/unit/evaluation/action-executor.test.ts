import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ActionExecutor } from '../../../src/evaluation/action-executor.js';
import { Bindings } from '../../../src/evaluation/bindings.js';
import { FactStore } from '../../../src/core/fact-store.js';
import { TraceCollector } from '../../../src/debugging/trace-collector.js';
import type { Logger } from '../../../src/utils/logger.js';
import type { RuleAction } from '../../../src/types/action.js';

function action(overrides: Partial<RuleAction>): RuleAction {
  return {
    type: 'assert',
    predicate: 'dry_environment',
    value: true,
    confidence: 1,
    explanation: '',
    ...overrides
  };
}

function createLoggerMock(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('ActionExecutor', () => {
  let facts: FactStore;
  let logger: Logger;
  let collector: TraceCollector;
  let executor: ActionExecutor;

  beforeEach(() => {
    facts = new FactStore();
    logger = createLoggerMock();
    collector = new TraceCollector();
    executor = new ActionExecutor(facts, { logger, collector });
  });

  it('assert creates a derived fact with the rule as origin', () => {
    const outcome = executor.execute(action({ explanation: 'Heating dries the air' }), new Bindings(), 'R1');

    expect(outcome).toEqual({ status: 'created', factId: 'F0001' });
    expect(facts.get('F0001')).toMatchObject({
      kind: 'derived',
      predicate: 'dry_environment',
      value: true,
      originRule: 'R1',
      justification: 'Heating dries the air'
    });
  });

  it('set behaves like assert', () => {
    executor.execute(action({ type: 'set', value: 'low' }), new Bindings(), 'R1');

    expect(facts.lookup('dry_environment')?.kind).toBe('derived');
  });

  it('uses a default justification', () => {
    executor.execute(action({}), new Bindings(), 'R9');

    expect(facts.lookup('dry_environment')?.justification).toBe('Derived by rule R9');
  });

  it('conclude creates a conclusion with its confidence', () => {
    executor.execute(action({ type: 'conclude', predicate: 'final_recommendation', value: 'cactus', confidence: 0.8 }), new Bindings(), 'R2');

    expect(facts.lookup('final_recommendation')).toMatchObject({ kind: 'conclusion', value: 'cactus', confidence: 0.8 });
  });

  it('recommend writes under the recommendation prefix', () => {
    executor.execute(action({ type: 'recommend', predicate: 'ideal_plant', value: 'snake plant' }), new Bindings(), 'R3');

    expect(facts.lookup('recommendation:ideal_plant')).toMatchObject({ kind: 'conclusion', value: 'snake plant' });
    expect(facts.exists('ideal_plant')).toBe(false);
  });

  it('honors a custom recommendation prefix', () => {
    const custom = new ActionExecutor(facts, { logger, recommendationPrefix: 'suggest.' });

    custom.execute(action({ type: 'recommend', predicate: 'pot' }), new Bindings(), 'R3');

    expect(facts.exists('suggest.pot', true)).toBe(true);
  });

  it('resolves bound variables', () => {
    executor.execute(action({ predicate: 'temperature', value: { var: 't' } }), new Bindings({ t: 21 }), 'R1');

    expect(facts.lookup('temperature')?.value).toBe(21);
  });

  it('asserts true when no value is given', () => {
    const { value: _omitted, ...withoutValue } = action({});

    executor.execute(withoutValue, new Bindings(), 'R1');

    expect(facts.lookup('dry_environment')?.value).toBe(true);
  });

  it('fails on an unbound variable and logs a warning', () => {
    const outcome = executor.execute(action({ value: { var: 'x' } }), new Bindings(), 'R1', 1);

    expect(outcome).toEqual({ status: 'failed', error: 'Unbound variable: $x' });
    expect(logger.warn).toHaveBeenCalledWith(
      'Action 1 (assert dry_environment) of rule "R1" failed: Unbound variable: $x'
    );
    expect(facts.size).toBe(0);
  });

  it('fails when the fact store rejects the confidence', () => {
    const outcome = executor.execute(action({ confidence: 2 }), new Bindings(), 'R1');

    expect(outcome.status).toBe('failed');
  });

  describe('increment', () => {
    it('adds the step to the newest value', () => {
      facts.assertInitial('watering_score', 2);

      const outcome = executor.execute(action({ type: 'increment', predicate: 'watering_score', value: 3 }), new Bindings(), 'R1');

      expect(outcome).toEqual({ status: 'created', factId: 'F0002' });
      expect(facts.lookup('watering_score')?.value).toBe(5);
    });

    it('defaults the step to one', () => {
      facts.assertInitial('watering_score', 2);
      const { value: _omitted, ...withoutValue } = action({ type: 'increment', predicate: 'watering_score' });

      executor.execute(withoutValue, new Bindings(), 'R1');

      expect(facts.lookup('watering_score')?.value).toBe(3);
    });

    it('skips a missing fact', () => {
      const outcome = executor.execute(action({ type: 'increment', predicate: 'watering_score', value: 1 }), new Bindings(), 'R1');

      expect(outcome).toEqual({ status: 'skipped', reason: 'fact_missing' });
    });

    it('skips a non numeric fact', () => {
      facts.assertInitial('watering_score', 'many');

      const outcome = executor.execute(action({ type: 'increment', predicate: 'watering_score', value: 1 }), new Bindings(), 'R1');

      expect(outcome).toEqual({ status: 'skipped', reason: 'not_numeric' });
    });

    it('fails on a non numeric step', () => {
      facts.assertInitial('watering_score', 1);

      const outcome = executor.execute(action({ type: 'increment', predicate: 'watering_score', value: 'lots' }), new Bindings(), 'R1');

      expect(outcome).toEqual({ status: 'failed', error: 'Increment step for "watering_score" is not numeric' });
    });
  });

  it('retract is a no-op', () => {
    facts.assertInitial('dry_environment', true);

    const outcome = executor.execute(action({ type: 'retract' }), new Bindings(), 'R1');

    expect(outcome).toEqual({ status: 'skipped', reason: 'retract_not_supported' });
    expect(facts.size).toBe(1);
  });

  it('records every execution in the trace', () => {
    executor.execute(action({}), new Bindings(), 'R1');
    executor.execute(action({ type: 'retract' }), new Bindings(), 'R1', 1);

    expect(executor.getTrace()).toEqual([
      { ruleId: 'R1', actionIndex: 0, actionType: 'assert', predicate: 'dry_environment', resolvedValue: true, status: 'created', factId: 'F0001' },
      { ruleId: 'R1', actionIndex: 1, actionType: 'retract', predicate: 'dry_environment', resolvedValue: true, status: 'skipped', reason: 'retract_not_supported' }
    ]);
    expect(collector.getByType('action_executed')).toHaveLength(2);
  });
});
