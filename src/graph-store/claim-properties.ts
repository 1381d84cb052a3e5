/**
 * Mapping between claims/evidence and the flat property maps stored on
 * graph nodes. Graph properties must be scalars, so the well-known provenance
 * fields are stored as top-level properties and any other provenance fields
 * travel as one JSON string.
 */
import {
  Provenance,
  ProvenanceValue,
  StoredClaim,
  StoredEvidence,
  isClaimStatus,
  isObjectKind,
} from '../types/claim';

type Scalar = string | number | boolean | null;

const STRING_PROVENANCE = [
  'who',
  'prompt_hash',
  'model_version',
  'git_sha',
  'image_digest',
  'run_id',
  'dataset_uri',
  'sensor_id',
] as const;

const NUMBER_PROVENANCE = ['when', 'frame_ts'] as const;

const KNOWN_PROVENANCE = new Set<string>([...STRING_PROVENANCE, ...NUMBER_PROVENANCE]);

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function isProvenanceValue(value: unknown): value is ProvenanceValue {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

export function claimToProperties(claim: StoredClaim): Record<string, Scalar> {
  const props: Record<string, Scalar> = {
    id: claim.id,
    subject_id: claim.subject_id,
    predicate: claim.predicate,
    object_kind: claim.object_kind,
    object_value: claim.object_value,
    status: claim.status,
    model_conf: claim.model_conf,
    human_conf: claim.human_conf,
    context_hash: claim.context_hash,
    created_at: claim.created_at,
  };

  const extra: Record<string, ProvenanceValue> = {};
  for (const [key, value] of Object.entries(claim.provenance)) {
    if (value === undefined) continue;
    if (KNOWN_PROVENANCE.has(key)) {
      props[key] = value;
    } else {
      extra[key] = value;
    }
  }
  props.provenance_extra = Object.keys(extra).length > 0 ? JSON.stringify(extra) : null;

  return props;
}

function parseExtra(raw: unknown): Record<string, ProvenanceValue> {
  if (typeof raw !== 'string') return {};
  const parsed: unknown = JSON.parse(raw);
  const out: Record<string, ProvenanceValue> = {};
  if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
    for (const [key, value] of Object.entries(parsed)) {
      if (isProvenanceValue(value)) out[key] = value;
    }
  }
  return out;
}

export function claimFromProperties(props: Record<string, unknown>): StoredClaim {
  const { id, subject_id, predicate, object_kind, object_value, status } = props;

  if (
    typeof id !== 'string' ||
    typeof subject_id !== 'string' ||
    typeof predicate !== 'string' ||
    typeof object_value !== 'string' ||
    !isObjectKind(object_kind) ||
    !isClaimStatus(status)
  ) {
    throw new Error(`Malformed claim node: ${String(id)}`);
  }

  const provenance: Provenance = {};
  for (const [key, value] of Object.entries(parseExtra(props.provenance_extra))) {
    provenance[key] = value;
  }
  for (const field of STRING_PROVENANCE) {
    const value = stringOrNull(props[field]);
    if (value !== null) provenance[field] = value;
  }
  for (const field of NUMBER_PROVENANCE) {
    const value = numberOrNull(props[field]);
    if (value !== null) provenance[field] = value;
  }

  return {
    id,
    subject_id,
    predicate,
    object_kind,
    object_value,
    status,
    model_conf: numberOrNull(props.model_conf),
    human_conf: numberOrNull(props.human_conf),
    context_hash: stringOrNull(props.context_hash),
    provenance,
    created_at: numberOrNull(props.created_at) ?? 0,
  };
}

export function evidenceToProperties(evidence: StoredEvidence): Record<string, Scalar> {
  return {
    id: evidence.id,
    uri_or_blob_ref: evidence.uri_or_blob_ref,
    snippet: evidence.snippet ?? null,
    hash: evidence.hash ?? null,
    source_type: evidence.source_type,
    quality_score: evidence.quality_score ?? null,
    timestamp: evidence.timestamp ?? null,
    created_at: evidence.created_at,
  };
}
