/**
 * Společná JSON schémata.
 */

export const errorResponseSchema = {
  type: 'object',
  properties: {
    statusCode: { type: 'number' },
    error: { type: 'string' },
    message: { type: 'string' },
    code: { type: 'string' },
    details: {}
  },
  required: ['statusCode', 'error', 'message']
} as const;

export const idParamSchema = {
  type: 'object',
  properties: {
    id: { type: 'string', minLength: 1 }
  },
  required: ['id']
} as const;
