import { SequentialIdGenerator } from '../utils/id-generator.js';
import { errorMessage, type Logger } from '../utils/logger.js';
import type {
  TraceEntry,
  TraceEntryType,
  TraceFilter,
  TraceSubscriber,
} from './types.js';

/**
 * Collects and indexes trace entries for one query.
 *
 * Entries are kept for the whole query and only dropped by {@link reset},
 * which the engine calls before the next query starts. Lookup by rule ID,
 * entry type and cycle is served from indexes.
 */
export class TraceCollector {
  private readonly entries: TraceEntry[] = [];
  private readonly byRule = new Map<string, number[]>();
  private readonly byType = new Map<TraceEntryType, number[]>();
  private readonly byCycle = new Map<number, number[]>();
  private readonly ids = new SequentialIdGenerator('T');
  private readonly subscribers = new Set<TraceSubscriber>();
  private currentCycle = 0;

  constructor(private readonly logger: Logger = console) {}

  /** Sets the cycle number stamped onto subsequent entries */
  setCycle(cycle: number): void {
    this.currentCycle = cycle;
  }

  get cycle(): number {
    return this.currentCycle;
  }

  /**
   * Record a new trace entry.
   */
  record(
    type: TraceEntryType,
    details: Record<string, unknown>,
    ruleId?: string
  ): TraceEntry {
    const entry: TraceEntry = {
      id: this.ids.next(),
      sequence: this.entries.length + 1,
      type,
      cycle: this.currentCycle,
      details,
      ...(ruleId !== undefined && { ruleId }),
    };

    const index = this.entries.length;
    this.entries.push(entry);
    this.addToIndex(this.byType, type, index);
    this.addToIndex(this.byCycle, entry.cycle, index);
    if (ruleId !== undefined) {
      this.addToIndex(this.byRule, ruleId, index);
    }

    this.notifySubscribers(entry);
    return entry;
  }

  /**
   * Get all trace entries for a given rule ID, in recording order.
   */
  getByRule(ruleId: string): TraceEntry[] {
    return this.resolveEntries(this.byRule.get(ruleId));
  }

  /**
   * Get all trace entries of a given type, in recording order.
   */
  getByType(type: TraceEntryType): TraceEntry[] {
    return this.resolveEntries(this.byType.get(type));
  }

  getByCycle(cycle: number): TraceEntry[] {
    return this.resolveEntries(this.byCycle.get(cycle));
  }

  /**
   * Query trace entries with flexible filtering.
   */
  query(filter: TraceFilter): TraceEntry[] {
    let result: TraceEntry[];

    // Start with the most selective filter
    if (filter.ruleId !== undefined) {
      result = this.getByRule(filter.ruleId);
    } else if (filter.cycle !== undefined) {
      result = this.getByCycle(filter.cycle);
    } else if (filter.types?.length === 1 && filter.types[0] !== undefined) {
      result = this.getByType(filter.types[0]);
    } else {
      result = [...this.entries];
    }

    if (filter.types && filter.types.length > 0) {
      const typeSet = new Set(filter.types);
      result = result.filter(e => typeSet.has(e.type));
    }

    if (filter.cycle !== undefined) {
      const cycle = filter.cycle;
      result = result.filter(e => e.cycle === cycle);
    }

    if (filter.limit !== undefined && result.length > filter.limit) {
      result = result.slice(-filter.limit);
    }

    return result;
  }

  /** All entries in recording order */
  getAll(): TraceEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Subscribe to new trace entries in real-time.
   * Returns an unsubscribe function.
   */
  subscribe(subscriber: TraceSubscriber): () => void {
    this.subscribers.add(subscriber);

    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  /** Drops all entries and indexes; subscribers stay attached */
  reset(): void {
    this.entries.length = 0;
    this.byRule.clear();
    this.byType.clear();
    this.byCycle.clear();
    this.ids.reset();
    this.currentCycle = 0;
  }

  private addToIndex<K>(index: Map<K, number[]>, key: K, position: number): void {
    let positions = index.get(key);
    if (!positions) {
      positions = [];
      index.set(key, positions);
    }
    positions.push(position);
  }

  private resolveEntries(positions: number[] | undefined): TraceEntry[] {
    if (!positions) {
      return [];
    }

    const result: TraceEntry[] = [];
    for (const position of positions) {
      const entry = this.entries[position];
      if (entry) {
        result.push(entry);
      }
    }
    return result;
  }

  private notifySubscribers(entry: TraceEntry): void {
    for (const subscriber of this.subscribers) {
      try {
        subscriber(entry);
      } catch (error) {
        this.logger.error(`Trace subscriber failed: ${errorMessage(error)}`);
      }
    }
  }
}
