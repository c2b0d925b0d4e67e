/** Smoothing constant of reciprocal rank fusion. */
export const RRF_K = 60;

export interface RankedHit<T> {
    id: string;
    item: T;
}

/**
 * Merges ranked lists by reciprocal rank fusion: a hit at zero-based
 * position i contributes 1 / (RRF_K + i + 1) to its id's score. Ties keep
 * first-seen order.
 */
export function fuseRankings<T>(lists: RankedHit<T>[][], size: number): { id: string; item: T; rrf: number }[] {
    const merged = new Map<string, { id: string; item: T; rrf: number }>();
    for (const list of lists) {
        list.forEach((hit, index) => {
            const current = merged.get(hit.id) ?? { id: hit.id, item: hit.item, rrf: 0 };
            current.rrf += 1 / (RRF_K + index + 1);
            merged.set(hit.id, current);
        });
    }
    return Array.from(merged.values())
        .sort((a, b) => b.rrf - a.rrf)
        .slice(0, size);
}
