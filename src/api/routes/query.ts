import type { FastifyInstance } from 'fastify';
import type { ConflictStrategy } from '../../types/activation.js';
import type { FactValue } from '../../types/fact.js';
import type { ExplanationTrace, QueryInput, QueryResult } from '../../types/result.js';
import type { InferenceEngineConfig } from '../../types/index.js';
import { InferenceEngine } from '../../core/inference-engine.js';
import { parseBooleanText, toFactValue } from '../../utils/values.js';
import { ValidationError } from '../middleware/error-handler.js';
import { querySchemas } from '../schemas/query.js';

interface QueryBody {
  facts: Record<string, unknown>;
  strategy?: ConflictStrategy;
  maxCycles?: number;
  includeTrace?: boolean;
}

export type QueryResponse = Omit<QueryResult, 'fullTrace'> & { fullTrace?: ExplanationTrace };

/**
 * Převede tělo požadavku na vstup dotazu.
 * Řetězce "true"/"false" z formulářů (v libovolné velikosti písmen)
 * se berou jako booleany.
 */
export function toQueryInput(facts: Record<string, unknown>): QueryInput {
  const input: Record<string, FactValue> = {};

  for (const [predicate, raw] of Object.entries(facts)) {
    const flag = typeof raw === 'string' ? parseBooleanText(raw) : undefined;
    if (flag !== undefined) {
      input[predicate] = flag;
      continue;
    }

    const value = toFactValue(raw);
    if (value === undefined) {
      throw new ValidationError(`Fact "${predicate}" has an unsupported value`, { field: `facts.${predicate}` });
    }
    input[predicate] = value;
  }

  return input;
}

export async function registerQueryRoutes(
  fastify: FastifyInstance,
  engineConfig: InferenceEngineConfig
): Promise<void> {
  const knowledge = fastify.knowledge;

  // POST /query - Spustí inferenci nad bází znalostí
  fastify.post<{ Body: QueryBody }>(
    '/query',
    { schema: querySchemas.run },
    async (request): Promise<QueryResponse> => {
      const { facts, strategy, maxCycles, includeTrace } = request.body;
      const input = toQueryInput(facts);

      const engine = new InferenceEngine({
        ...engineConfig,
        ...(strategy !== undefined && { strategy }),
        ...(maxCycles !== undefined && { maxCycles })
      });

      const result = engine.runQuery(knowledge, input);
      request.log.info({
        strategy: result.strategy,
        cycles: result.cyclesExecuted,
        rulesFired: result.rulesFired,
        terminationReason: result.terminationReason
      }, 'Query finished');

      if (includeTrace === true) {
        return result;
      }
      const { fullTrace: _trace, ...summary } = result;
      return summary;
    }
  );
}
