import {
  SchemaValidationError,
  validateChatMessages,
  validateClaimIdRequest,
  validateClaimProposal,
  validateCypherRequest,
  validateNeighborsRequest,
  validateQueryRequest,
} from '../../src/utils/schema-validator';
import { ValidationError } from '../../src/utils/errors';
import { logger } from '../../src/utils/logger';

describe('Schema Validator', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('validateClaimProposal', () => {
    it('applies defaults and drops unknown fields', () => {
      const body = { subject_id: 'A', predicate: 'USES', object_kind: 'entity', object_value: 'B', colour: 'red' };

      expect(validateClaimProposal(body)).toEqual({
        subject_id: 'A',
        predicate: 'USES',
        object_kind: 'entity',
        object_value: 'B',
        status: 'pending',
        evidence: [],
      });
    });

    it('keeps free-form provenance fields', () => {
      const proposal = validateClaimProposal({
        subject_id: 'A',
        predicate: 'USES',
        object_kind: 'entity',
        object_value: 'B',
        provenance: { who: 'ci', git_sha: 'abc123', ticket: 'OPS-1' },
      });

      expect(proposal.provenance).toEqual({ who: 'ci', git_sha: 'abc123', ticket: 'OPS-1' });
    });

    it('accepts null provenance', () => {
      const proposal = validateClaimProposal({
        subject_id: 'A',
        predicate: 'USES',
        object_kind: 'literal',
        object_value: '1',
        provenance: null,
      });
      expect(proposal.provenance).toBeNull();
    });

    it('reports every failing field', () => {
      const attempt = () =>
        validateClaimProposal({
          subject_id: 'A',
          predicate: 'USES',
          object_kind: 'edge',
          object_value: 'B',
          evidence: [{ uri_or_blob_ref: 'x', source_type: 'rumour', quality_score: 2 }],
        });

      expect(attempt).toThrow(SchemaValidationError);
      try {
        attempt();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        const paths = error instanceof ValidationError ? error.issues.map((issue) => issue.path) : [];
        expect(paths).toEqual(
          expect.arrayContaining(['/object_kind', '/evidence/0/source_type', '/evidence/0/quality_score']),
        );
      }
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ schema: 'claim_proposal.v1' }),
        'Schema validation failed',
      );
    });
  });

  describe('request bodies', () => {
    it('defaults cypher params to an empty object', () => {
      expect(validateCypherRequest({ query: 'RETURN 1' })).toEqual({ query: 'RETURN 1', params: {} });
    });

    it('defaults neighbors depth and limit', () => {
      expect(validateNeighborsRequest({ id: 'A' })).toEqual({ id: 'A', depth: 1, limit: 50 });
    });

    it('rejects a neighbors limit above 1000', () => {
      expect(() => validateNeighborsRequest({ id: 'A', limit: 5000 })).toThrow('Invalid neighbors_request');
    });

    it('accepts any non-empty claim id', () => {
      expect(validateClaimIdRequest({ claim_id: 'Claim:missing' })).toEqual({ claim_id: 'Claim:missing' });
      expect(() => validateClaimIdRequest({ claim_id: '' })).toThrow('Invalid claim_id_request');
    });

    it('accepts a zero step budget and caps it at 16', () => {
      expect(validateQueryRequest({ question: 'hi', max_steps: 0 })).toEqual({ question: 'hi', max_steps: 0 });
      expect(() => validateQueryRequest({ question: 'hi', max_steps: 17 })).toThrow('Invalid query_request');
    });

    it('requires a non-empty question', () => {
      expect(validateQueryRequest({ question: 'hi', max_steps: 2 })).toEqual({ question: 'hi', max_steps: 2 });
      expect(() => validateQueryRequest({ question: '' })).toThrow('Invalid query_request');
    });

    it('accepts a chat transcript with the tool role', () => {
      const messages = [
        { role: 'system', content: 's' },
        { role: 'tool', content: '{}' },
      ];
      expect(validateChatMessages(messages)).toEqual(messages);
    });

    it('rejects an empty transcript', () => {
      expect(() => validateChatMessages([])).toThrow('Invalid chat_messages');
    });
  });
});
