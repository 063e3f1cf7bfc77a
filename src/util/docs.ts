/**
 * Stable, readable id for a documentation source.
 *
 * URLs become `<host>[:port]/<path>[?query]` without protocol, `www.`, fragment or
 * trailing slash (e.g. https://www.example.com/docs/intro/ → example.com/docs/intro).
 * Repository paths are kept as-is apart from a leading ./ or / and backslashes
 * (./docs\chroma_init.md → docs/chroma_init.md).
 *
 * Sources with the same id are the same source: the store replaces and deletes by it.
 */
export function sourceIdFromUrl(source: string): string {
  const trimmed = source.trim();

  if (/^https?:\/\//i.test(trimmed)) {
    const urlObj = new URL(trimmed);
    const host = urlObj.host.replace(/^www\./, '');
    const path = urlObj.pathname.replace(/\/+$/, '');
    return `${host}${path}${urlObj.search}`;
  }

  return trimmed.replace(/\\/g, '/').replace(/^(\.\/)+/, '').replace(/^\/+/, '');
}

/**
 * Chunk ids are `<sourceId>#<index>`.
 */
export function chunkId(sourceId: string, index: number): string {
  return `${sourceId}#${index}`;
}

/**
 * Human-readable title for a source without one: the last path segment with
 * separators turned into spaces (docs/getting-started.md → getting started).
 */
export function titleFromSource(source: string): string {
  const id = sourceIdFromUrl(source).replace(/\?.*$/, '');
  const lastSegment = id.split('/').filter(Boolean).pop() ?? id;
  const withoutExt = lastSegment.replace(/\.(md|mdx|markdown|txt|html?|rst)$/i, '');
  return withoutExt.replace(/[-_]+/g, ' ').trim() || id;
}
