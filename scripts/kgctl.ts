/**
 * kgctl - command line client for a running claim gate
 *
 * Usage:
 *   GATEWAY=http://localhost:7000 GATEWAY_API_KEY=... npm run kgctl -- <command> [args]
 *
 * Commands:
 *   health
 *   neighbors <entity_id> [--depth 1] [--limit 50]
 *   propose <subject_id> <PREDICATE> <object_value> [--kind entity|literal] [--qual 0.9] [--model-conf 0.9]
 *   approve <claim_id>
 *   reject <claim_id>
 *   query <question...> [--max-steps 4]
 *   chat <prompt...>
 */
import { parseArgs } from 'node:util';
import axios, { AxiosInstance, isAxiosError } from 'axios';
import { ClaimProposal, ObjectKind, isObjectKind } from '../src/types/claim';
import { errorMessage } from '../src/utils/errors';

export type Command =
  | { name: 'health' }
  | { name: 'neighbors'; id: string; depth: number; limit: number }
  | { name: 'propose'; proposal: ClaimProposal }
  | { name: 'approve'; claimId: string }
  | { name: 'reject'; claimId: string }
  | { name: 'query'; question: string; maxSteps?: number }
  | { name: 'chat'; prompt: string };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const FLAGS = {
  depth: { type: 'string' },
  limit: { type: 'string' },
  kind: { type: 'string' },
  qual: { type: 'string' },
  'model-conf': { type: 'string' },
  'max-steps': { type: 'string' },
} as const;

function splitArgs(args: string[]) {
  try {
    return parseArgs({ args, options: FLAGS, allowPositionals: true, strict: true });
  } catch (error) {
    // Unknown flags and flags without a value
    throw new UsageError(errorMessage(error));
  }
}

function numberFlag(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new UsageError(`--${name} must be a number, got ${raw}`);
  return value;
}

function required(positional: string[], index: number, name: string): string {
  const value = positional[index];
  if (!value) throw new UsageError(`missing <${name}>`);
  return value;
}

/**
 * Claim body for `propose`: first-party log evidence at the given quality
 */
export function buildProposal(
  subjectId: string,
  predicate: string,
  objectValue: string,
  options: { kind?: ObjectKind; quality?: number; modelConf?: number } = {},
): ClaimProposal {
  return {
    subject_id: subjectId,
    predicate: predicate.toUpperCase(),
    object_kind: options.kind ?? 'entity',
    object_value: objectValue,
    model_conf: options.modelConf ?? 0.9,
    evidence: [
      {
        uri_or_blob_ref: `log://${subjectId}`,
        source_type: 'first_party_log',
        quality_score: options.quality ?? 0.9,
      },
    ],
    provenance: { who: 'kgctl' },
  };
}

export function parseCommand(argv: string[]): Command {
  const [name, ...rest] = argv;
  const { positionals: positional, values: flags } = splitArgs(rest);

  switch (name) {
    case 'health':
      return { name: 'health' };
    case 'neighbors':
      return {
        name: 'neighbors',
        id: required(positional, 0, 'entity_id'),
        depth: numberFlag(flags.depth, 'depth', 1),
        limit: numberFlag(flags.limit, 'limit', 50),
      };
    case 'propose': {
      const kind = flags.kind ?? 'entity';
      if (!isObjectKind(kind)) throw new UsageError(`--kind must be entity or literal, got ${kind}`);
      return {
        name: 'propose',
        proposal: buildProposal(
          required(positional, 0, 'subject_id'),
          required(positional, 1, 'predicate'),
          required(positional, 2, 'object_value'),
          {
            kind,
            quality: numberFlag(flags.qual, 'qual', 0.9),
            modelConf: numberFlag(flags['model-conf'], 'model-conf', 0.9),
          },
        ),
      };
    }
    case 'approve':
      return { name: 'approve', claimId: required(positional, 0, 'claim_id') };
    case 'reject':
      return { name: 'reject', claimId: required(positional, 0, 'claim_id') };
    case 'query': {
      const question = positional.join(' ');
      if (!question) throw new UsageError('missing <question>');
      const maxSteps = flags['max-steps'];
      return maxSteps !== undefined
        ? { name: 'query', question, maxSteps: numberFlag(maxSteps, 'max-steps', 4) }
        : { name: 'query', question };
    }
    case 'chat': {
      const prompt = positional.join(' ');
      if (!prompt) throw new UsageError('missing <prompt>');
      return { name: 'chat', prompt };
    }
    default:
      throw new UsageError(name ? `unknown command: ${name}` : 'missing command');
  }
}

export function createClient(baseURL: string, apiKey: string): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: 60_000,
    headers: apiKey ? { 'X-API-Key': apiKey } : {},
  });
}

export async function runCommand(client: AxiosInstance, command: Command): Promise<unknown> {
  switch (command.name) {
    case 'health':
      return (await client.get('/health')).data;
    case 'neighbors':
      return (await client.post('/neighbors', { id: command.id, depth: command.depth, limit: command.limit })).data;
    case 'propose':
      return (await client.post('/propose_claim', command.proposal)).data;
    case 'approve':
      return (await client.post('/approve', { claim_id: command.claimId })).data;
    case 'reject':
      return (await client.post('/reject', { claim_id: command.claimId })).data;
    case 'query':
      return (
        await client.post('/query', {
          question: command.question,
          ...(command.maxSteps !== undefined ? { max_steps: command.maxSteps } : {}),
        })
      ).data;
    case 'chat':
      return (await client.post('/llm_chat', [{ role: 'user', content: command.prompt }])).data;
  }
}

async function main(): Promise<void> {
  let command: Command;
  try {
    command = parseCommand(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      console.error('Usage: kgctl <health|neighbors|propose|approve|reject|query|chat> [args]');
      process.exit(2);
    }
    throw error;
  }

  const client = createClient(process.env.GATEWAY || 'http://localhost:7000', process.env.GATEWAY_API_KEY || '');

  try {
    const result = await runCommand(client, command);
    console.log(JSON.stringify(result, null, 2));
  } catch (error) {
    if (isAxiosError(error) && error.response) {
      console.error(`HTTP ${error.response.status}:`, JSON.stringify(error.response.data));
      process.exit(1);
    }
    throw error;
  }
}

// Execute if run directly
if (require.main === module) {
  main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
