import type {
    AggregateGroup,
    ImpactMetric,
    ImpactRankings,
    RankedEntry,
} from '../model/Models.ts';

export const DEFAULT_TOP_N = 10;

/**
 * Returns the top k entries of a label → value map, largest first.
 * The sort is stable, so equal values keep the map's insertion order.
 */
export function rankMetric(values: ReadonlyMap<string, number>, k: number): RankedEntry[] {
    const limit = Number.isFinite(k) ? Math.trunc(k) : 0;
    if (limit <= 0) return [];

    return Array.from(values, ([eventType, value]) => ({ eventType, value }))
        .sort((a, b) => b.value - a.value)
        .slice(0, limit);
}

export function rankGroups(
    groups: ReadonlyMap<string, AggregateGroup>,
    metric: ImpactMetric,
    k: number
): RankedEntry[] {
    const values = new Map<string, number>();
    for (const [label, group] of groups) {
        values.set(label, group[metric]);
    }
    return rankMetric(values, k);
}

/**
 * Ranks the groups independently by every impact metric.
 */
export function rankImpact(
    groups: ReadonlyMap<string, AggregateGroup>,
    k: number = DEFAULT_TOP_N
): ImpactRankings {
    return {
        fatalities: rankGroups(groups, 'fatalities', k),
        injuries: rankGroups(groups, 'injuries', k),
        propertyDamage: rankGroups(groups, 'propertyDamage', k),
        cropDamage: rankGroups(groups, 'cropDamage', k),
        totalDamage: rankGroups(groups, 'totalDamage', k),
    };
}
