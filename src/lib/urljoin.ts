/**
 * Joins URL segments with exactly one slash at each join point: at most one slash is
 * dropped from each side of it, so `urljoin('http://', 'x')` keeps the scheme's `//`.
 * Slashes inside a segment are left alone; empty segments are skipped.
 */
export function urljoin(...segments: string[]): string {
    return segments
        .filter(segment => segment.length > 0)
        .reduce((joined, segment) => {
            if (!joined) return segment;
            const head = joined.endsWith('/') ? joined.slice(0, -1) : joined;
            const tail = segment.startsWith('/') ? segment.slice(1) : segment;
            return `${head}/${tail}`;
        }, '');
}
