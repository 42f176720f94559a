/**
 * Path Resolver
 *
 * Reads and writes values inside nested content using field paths such as
 * `content.items[2].title`: dot-separated keys, each optionally followed by
 * one or more `[n]` indexes. Unresolvable paths never throw.
 */

import { ContentMap, ContentValue, isContentList, isContentMap } from '../entities/ContentValue';

export type PathSegment =
    | { kind: 'key'; key: string }
    | { kind: 'index'; index: number };

const SEGMENT_PATTERN = /([^.[\]]+)|\[(\d+)\]/g;
const PATH_PATTERN = /^[^.[\]]+(\[\d+\])*(\.[^.[\]]+(\[\d+\])*)*$/;

export function isValidPath(path: string): boolean {
    return PATH_PATTERN.test(path);
}

export function parsePath(path: string): PathSegment[] {
    const segments: PathSegment[] = [];
    for (const match of path.matchAll(SEGMENT_PATTERN)) {
        const [, key, index] = match;
        if (key !== undefined) {
            segments.push({ kind: 'key', key });
        } else if (index !== undefined) {
            segments.push({ kind: 'index', index: Number(index) });
        }
    }
    return segments;
}

function step(node: ContentValue | undefined, segment: PathSegment): ContentValue | undefined {
    if (segment.kind === 'key') {
        if (isContentMap(node) && Object.prototype.hasOwnProperty.call(node, segment.key)) {
            return node[segment.key];
        }
        return undefined;
    }
    if (isContentList(node) && segment.index < node.length) {
        return node[segment.index];
    }
    return undefined;
}

/**
 * Returns the value at `path`, or undefined when any segment does not resolve.
 */
export function getPath(doc: ContentValue, path: string): ContentValue | undefined {
    const segments = parsePath(path);
    if (segments.length === 0) return undefined;

    let current: ContentValue | undefined = doc;
    for (const segment of segments) {
        current = step(current, segment);
        if (current === undefined) return undefined;
    }
    return current;
}

/**
 * Writes `value` at `path`. Missing intermediate maps are created for key
 * segments; arrays are never created and existing scalars are never replaced
 * by containers. Returns false (leaving `doc` untouched) when the path
 * cannot be written.
 */
export function setPath(doc: ContentMap, path: string, value: ContentValue): boolean {
    const segments = parsePath(path);
    if (segments.length === 0) return false;

    let current: ContentValue = doc;
    for (let i = 0; i < segments.length - 1; i++) {
        const segment = segments[i];
        const child = step(current, segment);

        if (child === undefined) {
            const rest = segments.slice(i);
            if (!isContentMap(current) || !rest.every(s => s.kind === 'key')) {
                return false;
            }
            let node: ContentMap = current;
            for (const missing of rest.slice(0, -1)) {
                if (missing.kind !== 'key') return false;
                const created: ContentMap = {};
                node[missing.key] = created;
                node = created;
            }
            const leaf = rest[rest.length - 1];
            if (leaf.kind !== 'key') return false;
            node[leaf.key] = value;
            return true;
        }

        current = child;
    }

    const last = segments[segments.length - 1];
    if (last.kind === 'key') {
        if (!isContentMap(current)) return false;
        current[last.key] = value;
        return true;
    }
    if (isContentList(current) && last.index < current.length) {
        current[last.index] = value;
        return true;
    }
    return false;
}

/**
 * Last dotted segment of a path (`content.items[0].title` → `title`).
 */
export function leafName(path: string): string {
    const parts = path.split('.');
    return parts[parts.length - 1];
}
