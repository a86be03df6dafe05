import type { FastifyInstance } from 'fastify';
import type { Rule } from '../../types/rule.js';
import { NotFoundError } from '../middleware/error-handler.js';
import { ruleSchemas } from '../schemas/rule.js';

interface RuleParams {
  id: string;
}

interface RuleListQuery {
  domain?: string;
  tag?: string;
}

export async function registerRulesRoutes(fastify: FastifyInstance): Promise<void> {
  const knowledge = fastify.knowledge;

  // GET /rules - Seznam pravidel, volitelně podle domény a tagu
  fastify.get<{ Querystring: RuleListQuery }>(
    '/rules',
    { schema: ruleSchemas.list },
    async (request): Promise<readonly Rule[]> => {
      const { domain, tag } = request.query;
      let rules = domain !== undefined ? knowledge.getByDomain(domain) : knowledge.listRules();
      if (tag !== undefined) {
        rules = rules.filter(rule => rule.tags.includes(tag));
      }
      return rules;
    }
  );

  // GET /rules/:id - Detail pravidla
  fastify.get<{ Params: RuleParams }>(
    '/rules/:id',
    { schema: ruleSchemas.get },
    async (request): Promise<Rule> => {
      const rule = knowledge.getRule(request.params.id);
      if (!rule) {
        throw new NotFoundError('Rule', request.params.id);
      }
      return rule;
    }
  );

  // GET /domains - Domény v bázi znalostí
  fastify.get('/domains', async (): Promise<string[]> => {
    return knowledge.domains();
  });
}
