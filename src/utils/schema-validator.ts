import Ajv, { ErrorObject, SchemaObject } from 'ajv';
import claimProposalSchema from '../schemas/claim_proposal.v1.schema.json';
import cypherRequestSchema from '../schemas/cypher_request.schema.json';
import neighborsRequestSchema from '../schemas/neighbors_request.schema.json';
import claimIdRequestSchema from '../schemas/claim_id_request.schema.json';
import queryRequestSchema from '../schemas/query_request.schema.json';
import chatMessagesSchema from '../schemas/chat_messages.schema.json';
import { logger } from './logger';
import { ValidationError, ValidationIssue } from './errors';
import { ClaimProposal } from '../types/claim';
import { ChatMessage } from '../llm/types';

export interface CypherRequest {
  query: string;
  params: Record<string, unknown>;
}

export interface NeighborsRequest {
  id: string;
  depth: number;
  limit: number;
}

export interface ClaimIdRequest {
  claim_id: string;
}

export interface QueryRequest {
  question: string;
  max_steps?: number;
}

export class SchemaValidationError extends ValidationError {
  constructor(message: string, issues: ValidationIssue[]) {
    super(message, issues);
    this.name = 'SchemaValidationError';
  }
}

// Create and configure Ajv instance
const ajv = new Ajv({
  allErrors: true,
  removeAdditional: true,
  useDefaults: true,
  allowUnionTypes: true,
});

/**
 * Compile a schema once and return a function that validates, applies
 * defaults, and narrows the input
 */
function compileValidator<T>(schemaName: string, schema: SchemaObject): (data: unknown) => T {
  const validate = ajv.compile<T>(schema);

  return (data: unknown): T => {
    if (validate(data)) {
      return data;
    }

    const issues = formatValidationErrors(validate.errors || []);

    logger.warn({
      schema: schemaName,
      errors: issues,
    }, 'Schema validation failed');

    throw new SchemaValidationError(`Invalid ${schemaName}`, issues);
  };
}

/**
 * Format AJV errors into a more readable structure
 */
function formatValidationErrors(errors: ErrorObject[]): ValidationIssue[] {
  return errors.map(error => ({
    path: error.instancePath || '/',
    message: error.message || 'Unknown validation error',
  }));
}

export const validateClaimProposal = compileValidator<ClaimProposal>('claim_proposal.v1', claimProposalSchema);
export const validateCypherRequest = compileValidator<CypherRequest>('cypher_request', cypherRequestSchema);
export const validateNeighborsRequest = compileValidator<NeighborsRequest>('neighbors_request', neighborsRequestSchema);
export const validateClaimIdRequest = compileValidator<ClaimIdRequest>('claim_id_request', claimIdRequestSchema);
export const validateQueryRequest = compileValidator<QueryRequest>('query_request', queryRequestSchema);
export const validateChatMessages = compileValidator<ChatMessage[]>('chat_messages', chatMessagesSchema);
