/**
 * Model output parsing: from free text to a tagged action
 */
import { ClaimProposal } from '../types/claim';
import { ValidationError } from '../utils/errors';
import {
  validateClaimProposal,
  validateCypherRequest,
  validateNeighborsRequest,
} from '../utils/schema-validator';
import { TOOL_RESULT_CLOSE, TOOL_RESULT_OPEN } from '../llm/openai-chat-model';

export const TOOL_NAMES = ['neighbors', 'cypher', 'propose_claim'] as const;

/** A tool invocation as the model (or a router) writes it */
export interface ToolCall {
  tool: string;
  args: Record<string, unknown>;
}

export type Action =
  | { kind: 'neighbors'; id: string; depth: number; limit: number }
  | { kind: 'cypher'; query: string; params: Record<string, unknown> }
  | { kind: 'propose_claim'; claim: ClaimProposal }
  | { kind: 'final'; answer: string };

export type ToolAction = Exclude<Action, { kind: 'final' }>;

export type ModelReply = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function stripToolMarkers(text: string): string {
  let out = text.trim();
  if (out.startsWith(TOOL_RESULT_OPEN)) {
    out = out.slice(TOOL_RESULT_OPEN.length);
  }
  if (out.endsWith(TOOL_RESULT_CLOSE)) {
    out = out.slice(0, -TOOL_RESULT_CLOSE.length);
  }
  return out.trim();
}

function parseObject(candidate: string): ModelReply | null {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * First balanced {...} span, skipping braces inside string literals
 */
function firstBalancedObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/**
 * Pull the JSON object out of a model reply. Text that holds no parseable
 * object becomes a final answer, so a chatty model still ends the run.
 */
export function extractJson(text: string): ModelReply {
  const body = stripToolMarkers(text);

  const greedy = /\{.*\}/s.exec(body);
  if (greedy) {
    const parsed = parseObject(greedy[0]);
    if (parsed) return parsed;

    const balanced = firstBalancedObject(body);
    const fallback = balanced ? parseObject(balanced) : null;
    if (fallback) return fallback;
  }

  return { final: { answer: body } };
}

/**
 * `final` is accepted either as `{answer}` or as a bare string
 */
export function finalAnswer(reply: ModelReply): string | null {
  if (!('final' in reply)) return null;
  const final = reply.final;
  if (typeof final === 'string') return final;
  if (isRecord(final)) {
    const answer = final.answer;
    if (typeof answer === 'string') return answer;
    return answer === undefined || answer === null ? '' : JSON.stringify(answer);
  }
  return final === null || final === undefined ? '' : JSON.stringify(final);
}

export function toToolCall(reply: ModelReply): ToolCall {
  const { tool, args } = reply;
  if (typeof tool !== 'string' || tool.length === 0) {
    throw new ValidationError('model reply names no tool', [{ path: '/tool', message: 'is required' }]);
  }
  if (args !== undefined && !isRecord(args)) {
    throw new ValidationError(`arguments for ${tool} must be an object`, [{ path: '/args', message: 'must be object' }]);
  }
  return { tool, args: args ?? {} };
}

export interface ActionDefaults {
  neighborsLimit: number;
}

/**
 * Validate a tool call into an action. Unknown tools and malformed
 * arguments are ValidationErrors.
 */
export function parseAction(call: ToolCall, defaults: ActionDefaults): ToolAction {
  switch (call.tool) {
    case 'neighbors': {
      const { id, depth, limit } = validateNeighborsRequest({ limit: defaults.neighborsLimit, ...call.args });
      return { kind: 'neighbors', id, depth, limit };
    }
    case 'cypher': {
      const { query, params } = validateCypherRequest({ ...call.args });
      return { kind: 'cypher', query, params };
    }
    case 'propose_claim':
      return { kind: 'propose_claim', claim: validateClaimProposal({ ...call.args }) };
    default:
      throw new ValidationError(`unknown tool: ${call.tool}`, [
        { path: '/tool', message: `must be one of ${TOOL_NAMES.join(', ')}` },
      ]);
  }
}

/**
 * A reply carrying `final` ends the run; anything else must be a tool call
 */
export function parseReply(reply: ModelReply, defaults: ActionDefaults): Action {
  const answer = finalAnswer(reply);
  if (answer !== null) {
    return { kind: 'final', answer };
  }
  return parseAction(toToolCall(reply), defaults);
}
