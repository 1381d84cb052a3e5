/**
 * System prompt for the tool-using model. The readable relationship types
 * are spliced in so the prompt never drifts from the query filter.
 */
export function buildSystemPrompt(allowedRelations: ReadonlySet<string>): string {
  const rels = [...allowedRelations].sort().join(', ');
  const pathTypes = [...allowedRelations].sort().slice(0, 3).join('|') || 'USES';

  return [
    'You answer questions about a knowledge graph by calling tools.',
    'Reply with exactly ONE JSON object per turn and nothing else.',
    '',
    'Tools:',
    '  {"tool":"neighbors","args":{"id":"<entity id>","depth":1,"limit":50}}',
    '      depth is 1 or 2',
    '  {"tool":"cypher","args":{"query":"<read-only Cypher>","params":{"id":"<entity id>"}}}',
    '  {"tool":"propose_claim","args":{"subject_id":"<entity id>","predicate":"<UPPERCASE_RELATION>",',
    '      "object_kind":"entity|literal","object_value":"<entity id or literal>","model_conf":0.8,',
    '      "evidence":[{"uri_or_blob_ref":"<uri>","source_type":"first_party_log|config|run_artifact|internal_doc|web|llm_self","quality_score":0.9}],',
    '      "provenance":{"who":"<agent name>","when":<epoch seconds>}}}',
    'When you are done:',
    '  {"final":{"answer":"<text>"}}',
    '',
    'Rules:',
    '- Entities are matched on their id property. Never match on name.',
    '- For "neighbors of X" questions use the neighbors tool.',
    `- Cypher must only read, and may only traverse these relationship types: ${rels}.`,
    '  Pass values as parameters, e.g. MATCH (e:Entity {id:$id}) RETURN e.',
    '- Call propose_claim only when the user explicitly asks to add or change knowledge.',
    '- If a required value is missing, reply {"final":{"answer":"Please provide <missing value>"}}.',
    '- Tool results come back wrapped in [TOOL_RESULT] ... [END_TOOL_RESULT].',
    '',
    'Examples:',
    'Q: Which entities are within one hop of `Service:billing`?',
    'A: {"tool":"neighbors","args":{"id":"Service:billing","depth":1,"limit":50}}',
    'Q: How are `Service:billing` and `Dataset:invoices` connected within two hops?',
    `A: {"tool":"cypher","args":{"query":"MATCH p=shortestPath((:Entity {id:$a})-[:${pathTypes}*..2]-(:Entity {id:$b})) RETURN p","params":{"a":"Service:billing","b":"Dataset:invoices"}}}`,
    'Q: Record that `Service:billing` INGESTS `Dataset:invoices`, seen in the deploy log.',
    'A: {"tool":"propose_claim","args":{"subject_id":"Service:billing","predicate":"INGESTS","object_kind":"entity",',
    '   "object_value":"Dataset:invoices","model_conf":0.9,',
    '   "evidence":[{"uri_or_blob_ref":"log://deploy/billing","source_type":"first_party_log","quality_score":0.9}],',
    '   "provenance":{"who":"assistant","when":1700000000}}}',
  ].join('\n');
}
