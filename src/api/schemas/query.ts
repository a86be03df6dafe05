/**
 * JSON schémata pro Query API.
 *
 * Odpověď nemá response schéma - trace obsahuje volné struktury
 * (vazby, hodnoty faktů) a serializátor by je ořezal.
 */
import { CONFLICT_STRATEGIES } from '../../core/strategies.js';
import { errorResponseSchema } from './common.js';

export const queryBodySchema = {
  type: 'object',
  properties: {
    facts: {
      type: 'object',
      additionalProperties: true
    },
    strategy: { type: 'string', enum: [...CONFLICT_STRATEGIES] },
    maxCycles: { type: 'integer', minimum: 1 },
    includeTrace: { type: 'boolean', default: false }
  },
  required: ['facts'],
  additionalProperties: false
} as const;

export const querySchemas = {
  run: {
    body: queryBodySchema,
    response: {
      400: errorResponseSchema
    }
  }
};
