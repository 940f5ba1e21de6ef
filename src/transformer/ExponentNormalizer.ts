import { createLogger } from '../utils/Logger.ts';
import { AnomalyLog } from './AnomalyLog.ts';

import type {
    AnomalyKind,
    EventRecord,
    ExponentCode,
    NormalizedRecord,
} from '../model/Models.ts';
import type { Logger } from 'pino';

/**
 * Multipliers for the PROPDMGEXP / CROPDMGEXP symbols (case-sensitive).
 *   -, ?       = no usable magnitude
 *   +          = figure is already in dollars
 *   0..8       = tens
 *   h/k/m/b    = hundreds, thousands, millions, billions
 * '9' never had a documented meaning and stays unmapped.
 */
const EXPONENT_MULTIPLIERS: ReadonlyMap<string, number> = new Map([
    ['-', 0],
    ['?', 0],
    ['+', 1],
    ['0', 10],
    ['1', 10],
    ['2', 10],
    ['3', 10],
    ['4', 10],
    ['5', 10],
    ['6', 10],
    ['7', 10],
    ['8', 10],
    ['h', 100],
    ['H', 100],
    ['k', 1_000],
    ['K', 1_000],
    ['m', 1_000_000],
    ['M', 1_000_000],
    ['b', 1_000_000_000],
    ['B', 1_000_000_000],
]);

/** Symbols that resolve to a multiplier but still mark the figure as unknown */
const UNKNOWN_SYMBOLS: ReadonlySet<string> = new Set(['?']);

export interface ExponentResolution {
    multiplier: number;
    anomaly?: AnomalyKind;
}

/**
 * Pure lookup of the multiplier for an exponent code.
 */
export function resolveExponent(code: ExponentCode): ExponentResolution {
    switch (code.kind) {
        case 'blank':
            return { multiplier: 0 };
        case 'symbol': {
            const multiplier = EXPONENT_MULTIPLIERS.get(code.symbol);
            if (multiplier === undefined) {
                return { multiplier: 0, anomaly: 'unmapped_exponent_code' };
            }
            if (UNKNOWN_SYMBOLS.has(code.symbol)) {
                return { multiplier, anomaly: 'unknown_exponent_code' };
            }
            return { multiplier };
        }
    }
}

/**
 * Builds an ExponentCode from raw cell text. Empty and whitespace-only
 * cells are blank; anything else is kept exactly as written.
 */
export function parseExponentCode(raw: string | undefined): ExponentCode {
    if (raw === undefined || raw.trim() === '') {
        return { kind: 'blank' };
    }
    return { kind: 'symbol', symbol: raw };
}

export function formatExponentCode(code: ExponentCode): string {
    return code.kind === 'blank' ? '' : code.symbol;
}

/**
 * Applies exponent lookups and records every anomaly they raise in the
 * given log. Warns once per distinct unmapped code.
 */
export class ExponentNormalizer {
    private logger: Logger;
    readonly anomalies: AnomalyLog;

    constructor(anomalies: AnomalyLog = new AnomalyLog()) {
        this.logger = createLogger('ExponentNormalizer');
        this.anomalies = anomalies;
    }

    multiplierFor(code: ExponentCode): number {
        const { multiplier, anomaly } = resolveExponent(code);
        if (anomaly === undefined) {
            return multiplier;
        }

        const symbol = formatExponentCode(code);
        this.anomalies.record(anomaly, symbol);
        if (anomaly === 'unmapped_exponent_code' && this.anomalies.isFirstSighting(symbol)) {
            this.logger.warn(`Unmapped exponent code '${symbol}', using multiplier 0`);
        }
        return multiplier;
    }

    /**
     * Normalizes the damage figures of one record. Missing magnitudes
     * count as malformed and contribute 0.
     */
    normalize(record: EventRecord): NormalizedRecord {
        const propertyDamage = this.scale(record.propertyDamage, record.propertyDamageExp);
        const cropDamage = this.scale(record.cropDamage, record.cropDamageExp);

        return {
            eventType: record.eventType,
            propertyDamage,
            cropDamage,
            totalDamage: propertyDamage + cropDamage,
        };
    }

    private scale(magnitude: number | null, code: ExponentCode): number {
        const multiplier = this.multiplierFor(code);
        if (magnitude === null) {
            this.anomalies.record('malformed_numeric');
            return 0;
        }
        return magnitude * multiplier;
    }
}
