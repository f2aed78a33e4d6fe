import picomatch from 'picomatch';

const GLOB_CHARS = /[*?[\]{}]/;

/**
 * Trailing separators are dropped so `/usr/include/` and `/usr/include` compare equal.
 * Comparison stays case-sensitive and does not touch the filesystem.
 */
export function normalizeIncludePath(p: string): string {
    let end = p.length;
    while (end > 1 && (p[end - 1] === '/' || p[end - 1] === '\\')) end--;
    return p.slice(0, end);
}

export function hasGlobSyntax(pattern: string): boolean {
    return GLOB_CHARS.test(pattern);
}

export function createPathMatcher(pattern: string): (dir: string) => boolean {
    const wanted = normalizeIncludePath(pattern);
    if (!hasGlobSyntax(wanted)) {
        return dir => normalizeIncludePath(dir) === wanted;
    }
    const isMatch = picomatch(wanted, { dot: true });
    return dir => isMatch(normalizeIncludePath(dir));
}
