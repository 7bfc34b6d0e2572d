import type { ScriptDescriptor, TagQuery } from "./model";

type QuerySource = Pick<URLSearchParams, "get">;

// Only one filter mode is honored per query; order decides which.
const TAG_QUERY_KEYS = [
  ["tags", "tags"],
  ["not_tags", "notTags"],
  ["any_tags", "anyTags"],
] as const;

function splitCsv(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

export function emptyTagQuery(): TagQuery {
  return { tags: [], notTags: [], anyTags: [] };
}

export function parseTagQuery(params: QuerySource): TagQuery {
  const query = emptyTagQuery();
  for (const [param, field] of TAG_QUERY_KEYS) {
    const raw = params.get(param);
    if (raw === null) continue;
    const values = splitCsv(raw);
    if (values.length === 0) continue;
    query[field] = values;
    break;
  }
  return query;
}

export function matchesTagQuery(script: Pick<ScriptDescriptor, "tags">, query: TagQuery): boolean {
  const tags = new Set(script.tags);
  if (query.tags.length > 0) return query.tags.every((tag) => tags.has(tag));
  if (query.notTags.length > 0) return query.notTags.every((tag) => !tags.has(tag));
  if (query.anyTags.length > 0) return query.anyTags.some((tag) => tags.has(tag));
  return true;
}
