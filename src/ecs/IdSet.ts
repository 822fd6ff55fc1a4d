import type { EntityId } from "./Types";

/**
 * Keeps the ids of `candidates` that `has` accepts, preserving order.
 */
export function intersectIds(candidates: readonly EntityId[], has: (id: EntityId) => boolean): EntityId[] {
    const out: EntityId[] = [];
    for (const id of candidates) {
        if (has(id)) out.push(id);
    }
    return out;
}

/**
 * Ids in `candidates` present in every table, in `candidates` order.
 * A missing table (undefined) empties the result.
 */
export function idsInAll(
    candidates: readonly EntityId[],
    tables: ReadonlyArray<{ has(id: EntityId): boolean } | undefined>
): EntityId[] {
    // dedupe; the creation list never repeats, but callers may pass anything
    let out = Array.from(new Set(candidates));
    for (const t of tables) {
        if (!t) return [];
        if (out.length === 0) return out;
        out = intersectIds(out, (id) => t.has(id));
    }
    return out;
}
