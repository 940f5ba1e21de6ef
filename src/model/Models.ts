/**
 * Raw dataset as loaded from disk or downloaded, before parsing
 */
export interface RawDataset {
    format: 'csv';
    data: string;
    sourceName: string;        // e.g. 'repdata_data_StormData'
}

// ── Extractor output models ──

/**
 * Exponent code as it appears in the PROPDMGEXP / CROPDMGEXP columns.
 * Blank cells are their own variant so every lookup is exhaustive.
 */
export type ExponentCode =
    | { kind: 'blank' }
    | { kind: 'symbol'; symbol: string };

/**
 * A single storm event row. Numeric fields are null when the source
 * cell was empty or could not be read as a non-negative number.
 */
export interface EventRecord {
    readonly eventType: string;        // EVTYPE, verbatim ('' when the cell is empty)
    readonly fatalities: number | null;
    readonly injuries: number | null;
    readonly propertyDamage: number | null;
    readonly propertyDamageExp: ExponentCode;
    readonly cropDamage: number | null;
    readonly cropDamageExp: ExponentCode;
}

/**
 * Result of an extraction run
 */
export interface ExtractResult {
    records: EventRecord[];
    sourceName: string;
}

// ── Transformer output models ──

/**
 * Damage figures of one record after applying the exponent multipliers (USD)
 */
export interface NormalizedRecord {
    eventType: string;
    propertyDamage: number;
    cropDamage: number;
    totalDamage: number;
}

/**
 * Running totals for one event type label
 */
export interface AggregateGroup {
    eventType: string;
    eventCount: number;
    fatalities: number;
    injuries: number;
    propertyDamage: number;
    cropDamage: number;
    totalDamage: number;
}

export type ImpactMetric =
    | 'fatalities'
    | 'injuries'
    | 'propertyDamage'
    | 'cropDamage'
    | 'totalDamage';

export type AnomalyKind =
    | 'unmapped_exponent_code'
    | 'unknown_exponent_code'
    | 'malformed_numeric'
    | 'missing_event_type';

export const ANOMALY_KINDS: readonly AnomalyKind[] = [
    'unmapped_exponent_code',
    'unknown_exponent_code',
    'malformed_numeric',
    'missing_event_type',
];

export interface AnomalySummary {
    total: number;
    byKind: Record<AnomalyKind, number>;
    /** Occurrences of each exponent code that had no multiplier */
    unmappedCodes: Record<string, number>;
}

/**
 * Result of an aggregation pass. Groups keep first-seen label order.
 */
export interface AggregationResult {
    groups: Map<string, AggregateGroup>;
    anomalies: AnomalySummary;
    recordCount: number;
}

// ── Ranker / report models ──

export interface RankedEntry {
    eventType: string;
    value: number;
}

export type ImpactRankings = Record<ImpactMetric, RankedEntry[]>;

export interface ImpactReport {
    recordCount: number;
    groupCount: number;
    topN: number;
    rankings: ImpactRankings;
    anomalies: AnomalySummary;
}
