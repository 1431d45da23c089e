/**
 * Match Engine
 *
 * Narrows candidate windows one attribute at a time. Each pass runs the
 * attribute's expression inside every surviving window; anchor positions must
 * resolve to the same token span in every pass that sees them. Once a pass
 * has resolved a repeating anchor, later passes hold it to that token count.
 */
import { REGEX_ATTRIBUTE } from './attributes';
import { groupName, type AttributePass, type CompiledPattern } from './compiler';
import { toTokenSpan, type AttributeProjection, type ProjectionCache } from './projector';

export type TokenSpan = [start: number, end: number];

interface Candidate {
    start: number;
    end: number;
    /** 1-based position -> token span */
    anchors: Map<number, TokenSpan>;
}

/**
 * Token spans matched by one compiled pattern, ordered by start then end.
 */
export function findPatternMatches(
    projections: ProjectionCache,
    compiled: CompiledPattern,
    tokenCount: number
): TokenSpan[] {
    if (tokenCount === 0) return [];

    let candidates: Candidate[] = [{ start: 0, end: tokenCount, anchors: new Map() }];

    for (const pass of compiled.passes) {
        const projection = projections.get(pass.attribute);
        const next: Candidate[] = [];
        const seen = new Set<string>();

        for (const candidate of candidates) {
            for (const found of scanWindow(pass, projection, candidate, compiled)) {
                if (!anchorsAgree(candidate.anchors, found.anchors)) continue;

                const anchors = new Map(candidate.anchors);
                for (const [position, span] of found.anchors) anchors.set(position, span);

                const key = candidateKey(found.start, found.end, anchors);
                if (seen.has(key)) continue;
                seen.add(key);
                next.push({ start: found.start, end: found.end, anchors });
            }
        }

        candidates = next;
        if (candidates.length === 0) return [];
    }

    const spans = candidates.map((c): TokenSpan => [c.start, c.end]);
    // Fixed-length spans sharing an end are identical, nothing to filter
    return compiled.fixedLength !== null ? uniqueSpans(spans) : filterSubmatches(spans);
}

function* scanWindow(
    pass: AttributePass,
    projection: AttributeProjection,
    window: Candidate,
    compiled: CompiledPattern
): Generator<Candidate> {
    const regex = pass.pinned(tokenCounts(window.anchors));
    const offsets = projection.indexToOffset;
    const baseOffset = offsets[window.start];
    const text = projection.text.slice(baseOffset, offsets[window.end]);
    const checkAnchors = pass.attribute !== REGEX_ATTRIBUTE;

    const resolve = (match: RegExpExecArray): Candidate | null => {
        const indices = match.indices;
        if (!indices) return null;
        const [matchStart, matchEnd] = indices[0];
        if (matchStart === matchEnd) return null;

        const [start, end] = toTokenSpan(projection, baseOffset + matchStart, baseOffset + matchEnd);
        if (start >= end) return null;

        const anchors = new Map<number, TokenSpan>();
        if (checkAnchors) {
            for (const position of compiled.anchors) {
                const groupSpan = indices.groups?.[groupName(position - 1)];
                if (!groupSpan) continue;
                anchors.set(position, toTokenSpan(projection, baseOffset + groupSpan[0], baseOffset + groupSpan[1]));
            }
        }
        return { start, end, anchors };
    };

    if (pass.attribute === REGEX_ATTRIBUTE) {
        // Overlapping search: retry one character after each match start
        regex.lastIndex = 0;
        let match: RegExpExecArray | null;
        while ((match = regex.exec(text)) !== null) {
            const found = resolve(match);
            if (found) yield found;
            regex.lastIndex = match.index + 1;
        }
        return;
    }

    // Exact full-span fast path: only starts leaving room for the whole pattern
    const lastStart = compiled.fixedLength !== null ? window.end - compiled.fixedLength : window.end - 1;
    for (let i = window.start; i <= lastStart; i++) {
        regex.lastIndex = offsets[i] - baseOffset;
        const match = regex.exec(text);
        if (!match) continue;
        const found = resolve(match);
        if (found) yield found;
    }
}

function tokenCounts(anchors: Map<number, TokenSpan>): Map<number, number> {
    const counts = new Map<number, number>();
    for (const [position, [start, end]] of anchors) counts.set(position, end - start);
    return counts;
}

function anchorsAgree(previous: Map<number, TokenSpan>, current: Map<number, TokenSpan>): boolean {
    for (const [position, span] of current) {
        const before = previous.get(position);
        if (before && (before[0] !== span[0] || before[1] !== span[1])) {
            return false;
        }
    }
    return true;
}

function candidateKey(start: number, end: number, anchors: Map<number, TokenSpan>): string {
    const parts = Array.from(anchors)
        .sort((a, b) => a[0] - b[0])
        .map(([position, [s, e]]) => `${position}:${s}-${e}`);
    return `${start}-${end}|${parts.join(',')}`;
}

function compareSpans(a: TokenSpan, b: TokenSpan): number {
    return a[0] - b[0] || a[1] - b[1];
}

export function uniqueSpans(spans: TokenSpan[]): TokenSpan[] {
    const byKey = new Map<string, TokenSpan>();
    for (const span of spans) byKey.set(`${span[0]}-${span[1]}`, span);
    return Array.from(byKey.values()).sort(compareSpans);
}

/**
 * Among spans sharing an end index, keep the one starting earliest.
 */
export function filterSubmatches(spans: TokenSpan[]): TokenSpan[] {
    const earliestStart = new Map<number, number>();
    for (const [start, end] of spans) {
        const current = earliestStart.get(end);
        if (current === undefined || start < current) {
            earliestStart.set(end, start);
        }
    }
    return Array.from(earliestStart, ([end, start]): TokenSpan => [start, end]).sort(compareSpans);
}
