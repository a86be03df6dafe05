/**
 * JSON schémata pro Health API.
 */

export const healthResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['ok'] },
    timestamp: { type: 'number' },
    uptime: { type: 'number' },
    version: { type: 'string' },
    knowledgeBase: {
      type: 'object',
      properties: {
        rules: { type: 'number' },
        domains: { type: 'number' }
      },
      required: ['rules', 'domains']
    }
  },
  required: ['status', 'timestamp', 'uptime', 'version', 'knowledgeBase']
} as const;

export const healthSchemas = {
  health: {
    response: {
      200: healthResponseSchema
    }
  }
};
