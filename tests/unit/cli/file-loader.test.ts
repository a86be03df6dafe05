import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import {
  loadFactsFile,
  loadKnowledgeBase,
  loadRuleItems,
  loadRules,
  parseFactAssignment
} from '../../../src/cli/utils/file-loader.js';
import {
  FileNotFoundError,
  InvalidArgumentsError,
  ValidationError
} from '../../../src/cli/utils/errors.js';

const FIXTURES = fileURLToPath(new URL('../../fixtures/cli/', import.meta.url));
const fixture = (name: string): string => `${FIXTURES}${name}`;

describe('file-loader', () => {
  describe('loadRuleItems', () => {
    it('returns raw items with the absolute path', () => {
      const result = loadRuleItems(fixture('invalid-rules.yaml'));

      expect(result.data).toHaveLength(2);
      expect(result.path).toBe(fixture('invalid-rules.yaml'));
    });

    it('turns parse problems into validation errors', () => {
      expect(() => loadRuleItems(fixture('broken.yaml'))).toThrow(ValidationError);
    });

    it('reports a missing file', () => {
      expect(() => loadRuleItems('nope.yaml')).toThrow(new FileNotFoundError('nope.yaml'));
    });
  });

  describe('loadRules', () => {
    it('loads structurally valid rules', async () => {
      const { data } = await loadRules(fixture('rules.json'));

      expect(data.map(r => r.id)).toEqual(['WARM', 'COMFORT']);
    });

    it('rejects structural errors', async () => {
      await expect(loadRules(fixture('invalid-structure.yaml'))).rejects.toThrow(
        `${fixture('invalid-structure.yaml')}: rules[0]: missing required field "actions"`
      );
    });
  });

  describe('loadKnowledgeBase', () => {
    it('registers every rule', async () => {
      const { data } = await loadKnowledgeBase(fixture('rules.json'));

      expect(data.size).toBe(2);
      expect(data.domains()).toEqual(['environment', 'final_recommendation']);
    });

    it('accepts rules that only have warnings', async () => {
      const { data } = await loadKnowledgeBase(fixture('warnings.yaml'));

      expect(data.listRules().map(r => r.id)).toEqual(['COPY_LEVEL']);
    });

    it('reports semantic errors with their issues', async () => {
      const error: unknown = await loadKnowledgeBase(fixture('semantic-error.yaml')).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe(
          'Rule "TOO_SURE" is invalid: actions[0].confidence: Action confidence must be a number between 0 and 1'
        );
        expect(error.errors.map(e => e.path)).toEqual(['actions[0].confidence']);
        expect(error.exitCode).toBe(3);
      }
    });

    it('reports duplicate ids', async () => {
      await expect(loadKnowledgeBase(fixture('duplicate-ids.yaml'))).rejects.toThrow(
        new ValidationError('Rule "SAME" is already registered')
      );
    });
  });

  describe('loadFactsFile', () => {
    it('reads a predicate map', () => {
      expect(loadFactsFile(fixture('facts.yaml'))).toEqual({ temperature: 21, location: 'indoor' });
    });

    it('rejects anything but an object', () => {
      expect(() => loadFactsFile(fixture('facts-list.yaml')))
        .toThrow('Facts file must contain an object of predicate: value pairs');
    });
  });

  describe('parseFactAssignment', () => {
    it.each([
      ['location=indoor', ['location', 'indoor']],
      ['pets_present=TRUE', ['pets_present', true]],
      ['pets_present=false', ['pets_present', false]],
      ['heating_level=3', ['heating_level', 3]],
      ['offset=-1.5', ['offset', -1.5]],
      ['version=1.2.3', ['version', '1.2.3']],
      ['note=a=b', ['note', 'a=b']],
      [' light = high ', ['light', 'high']]
    ])('parses %j', (assignment, expected) => {
      expect(parseFactAssignment(assignment)).toEqual(expected);
    });

    it('requires predicate=value', () => {
      expect(() => parseFactAssignment('location')).toThrow(
        new InvalidArgumentsError('Invalid fact "location", expected predicate=value')
      );
      expect(() => parseFactAssignment('=indoor')).toThrow(InvalidArgumentsError);
      expect(() => parseFactAssignment('  =x')).toThrow('Invalid fact "  =x", predicate is empty');
    });
  });
});
