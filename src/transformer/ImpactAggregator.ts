import { createLogger } from '../utils/Logger.ts';
import { AnomalyLog, mergeAnomalySummaries } from './AnomalyLog.ts';
import { ExponentNormalizer } from './ExponentNormalizer.ts';

import type {
    AggregateGroup,
    AggregationResult,
    EventRecord,
} from '../model/Models.ts';
import type { LabelCanonicalizer } from './LabelCanonicalizer.ts';
import type { Logger } from 'pino';

export interface AggregatorOptions {
    /** Optional label cleanup stage; labels are grouped verbatim without it */
    canonicalizer?: LabelCanonicalizer;
}

/**
 * Groups storm event records by event type and sums their fatalities,
 * injuries and normalized damage.
 *
 * Labels are compared as exact strings, so 'TSTM WIND' and
 * 'THUNDERSTORM WIND' stay separate unless a canonicalizer is set.
 * Records with an empty label are kept under '' and counted as
 * missing_event_type anomalies.
 * Every call to aggregate() starts from an empty map and a fresh
 * anomaly log.
 */
export class ImpactAggregator {
    private logger: Logger;
    private canonicalizer?: LabelCanonicalizer;

    constructor(options: AggregatorOptions = {}) {
        this.logger = createLogger('ImpactAggregator');
        this.canonicalizer = options.canonicalizer;
    }

    aggregate(records: Iterable<EventRecord>): AggregationResult {
        this.logger.info('Starting aggregation...');

        const anomalies = new AnomalyLog();
        const normalizer = new ExponentNormalizer(anomalies);
        const groups = new Map<string, AggregateGroup>();
        let recordCount = 0;

        for (const record of records) {
            recordCount++;
            const label = this.canonicalizer
                ? this.canonicalizer(record.eventType)
                : record.eventType;
            if (label === '') {
                anomalies.record('missing_event_type');
            }

            let group = groups.get(label);
            if (!group) {
                group = emptyGroup(label);
                groups.set(label, group);
            }

            const damage = normalizer.normalize(record);

            group.eventCount++;
            group.fatalities += this.count(record.fatalities, anomalies);
            group.injuries += this.count(record.injuries, anomalies);
            group.propertyDamage += damage.propertyDamage;
            group.cropDamage += damage.cropDamage;
            group.totalDamage += damage.totalDamage;
        }

        const summary = anomalies.summary();
        this.logger.info(
            `Aggregation complete: ${recordCount} records, ${groups.size} event types, ${summary.total} anomalies`
        );
        if (summary.total > 0) {
            this.logger.warn({ anomalies: summary.byKind }, 'Data quality anomalies found');
        }

        return { groups, anomalies: summary, recordCount };
    }

    private count(value: number | null, anomalies: AnomalyLog): number {
        if (value === null) {
            anomalies.record('malformed_numeric');
            return 0;
        }
        return value;
    }
}

export function emptyGroup(eventType: string): AggregateGroup {
    return {
        eventType,
        eventCount: 0,
        fatalities: 0,
        injuries: 0,
        propertyDamage: 0,
        cropDamage: 0,
        totalDamage: 0,
    };
}

/**
 * Combines two aggregation results (e.g. from separate partitions of the
 * input). Per-label sums are added; labels keep a's order, then b's new ones.
 */
export function mergeAggregations(a: AggregationResult, b: AggregationResult): AggregationResult {
    const groups = new Map<string, AggregateGroup>();

    for (const source of [a.groups, b.groups]) {
        for (const [label, group] of source) {
            const merged = groups.get(label) ?? emptyGroup(label);
            groups.set(label, {
                eventType: label,
                eventCount: merged.eventCount + group.eventCount,
                fatalities: merged.fatalities + group.fatalities,
                injuries: merged.injuries + group.injuries,
                propertyDamage: merged.propertyDamage + group.propertyDamage,
                cropDamage: merged.cropDamage + group.cropDamage,
                totalDamage: merged.totalDamage + group.totalDamage,
            });
        }
    }

    return {
        groups,
        anomalies: mergeAnomalySummaries(a.anomalies, b.anomalies),
        recordCount: a.recordCount + b.recordCount,
    };
}
