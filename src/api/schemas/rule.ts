/**
 * JSON schémata pro Rules API.
 */
import { errorResponseSchema, idParamSchema } from './common.js';

export const ruleListQuerySchema = {
  type: 'object',
  properties: {
    domain: { type: 'string', minLength: 1 },
    tag: { type: 'string', minLength: 1 }
  },
  additionalProperties: false
} as const;

export const ruleSchemas = {
  list: {
    querystring: ruleListQuerySchema
  },
  get: {
    params: idParamSchema,
    response: {
      404: errorResponseSchema
    }
  }
};
