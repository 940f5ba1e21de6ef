import { ImpactAggregator } from '../transformer/ImpactAggregator.ts';
import { canonicalizeEventType } from '../transformer/LabelCanonicalizer.ts';
import { DEFAULT_TOP_N, rankImpact } from '../ranker/Ranker.ts';

import type { EventRecord, ImpactReport } from '../model/Models.ts';

export interface PipelineOptions {
    topN?: number;
    canonicalizeLabels?: boolean;
}

/**
 * Aggregates a batch of records and ranks the event types by every
 * impact metric. Same input, same report.
 */
export function runImpactPipeline(
    records: Iterable<EventRecord>,
    options: PipelineOptions = {}
): ImpactReport {
    const topN = options.topN ?? DEFAULT_TOP_N;
    const aggregator = new ImpactAggregator({
        canonicalizer: options.canonicalizeLabels ? canonicalizeEventType : undefined,
    });

    const { groups, anomalies, recordCount } = aggregator.aggregate(records);

    return {
        recordCount,
        groupCount: groups.size,
        topN,
        rankings: rankImpact(groups, topN),
        anomalies,
    };
}
