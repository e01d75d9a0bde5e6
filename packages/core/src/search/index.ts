/**
 * Module search scoring
 *
 * Each query token scores by the first rule it satisfies, in table order.
 * Token scores are summed. Ordering is score desc, then most recent
 * published_at, then (namespace, module, provider).
 */

export interface SearchFields {
  namespace: string;
  module: string;
  provider: string;
  description: string | null;
  owner: string | null;
  /** ISO 8601 */
  publishedAt: string | null;
}

type TextField = 'namespace' | 'module' | 'provider' | 'description' | 'owner';

interface ScoreRule {
  field: TextField;
  match: 'exact' | 'substring';
  score: number;
}

export const SCORE_RULES: readonly ScoreRule[] = Object.freeze([
  { field: 'module', match: 'exact', score: 20 },
  { field: 'namespace', match: 'exact', score: 18 },
  { field: 'provider', match: 'exact', score: 14 },
  { field: 'description', match: 'exact', score: 13 },
  { field: 'owner', match: 'exact', score: 12 },
  { field: 'module', match: 'substring', score: 5 },
  { field: 'description', match: 'substring', score: 4 },
  { field: 'owner', match: 'substring', score: 3 },
  { field: 'namespace', match: 'substring', score: 2 },
]);

export function tokenizeQuery(query: string): string[] {
  return query
    .toLowerCase()
    .split(/\s+/)
    .filter(token => token.length > 0);
}

function fieldValue(fields: SearchFields, field: TextField): string {
  return (fields[field] ?? '').toLowerCase();
}

/**
 * Score of one (lower-case) token
 */
export function scoreToken(token: string, fields: SearchFields): number {
  for (const rule of SCORE_RULES) {
    const value = fieldValue(fields, rule.field);
    if (rule.match === 'exact' ? value === token : value.includes(token)) {
      return rule.score;
    }
  }
  return 0;
}

/**
 * Row filter: provider equals the token, or the token is a substring of
 * module, namespace, description or owner
 */
export function matchesToken(token: string, fields: SearchFields): boolean {
  if (fieldValue(fields, 'provider') === token) return true;
  return (['module', 'namespace', 'description', 'owner'] as const).some(field =>
    fieldValue(fields, field).includes(token)
  );
}

export function scoreCandidate(tokens: readonly string[], fields: SearchFields): number {
  return tokens.reduce((total, token) => total + scoreToken(token, fields), 0);
}

export interface RankedResult<T> {
  item: T;
  score: number;
}

/**
 * Filter, score and order candidates. Every token must match.
 */
export function rankCandidates<T>(
  items: readonly T[],
  query: string,
  fieldsOf: (item: T) => SearchFields
): RankedResult<T>[] {
  const tokens = tokenizeQuery(query);
  const ranked: Array<RankedResult<T> & { fields: SearchFields }> = [];

  for (const item of items) {
    const fields = fieldsOf(item);
    if (!tokens.every(token => matchesToken(token, fields))) continue;
    ranked.push({ item, score: scoreCandidate(tokens, fields), fields });
  }

  ranked.sort((a, b) => {
    if (a.score !== b.score) return b.score - a.score;
    const publishedA = a.fields.publishedAt ?? '';
    const publishedB = b.fields.publishedAt ?? '';
    if (publishedA !== publishedB) return publishedA < publishedB ? 1 : -1;
    return (
      compareText(a.fields.namespace, b.fields.namespace) ||
      compareText(a.fields.module, b.fields.module) ||
      compareText(a.fields.provider, b.fields.provider)
    );
  });

  return ranked.map(({ item, score }) => ({ item, score }));
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
