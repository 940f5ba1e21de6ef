import { csvParse } from 'd3-dsv';

import { createLogger } from '../utils/Logger.ts';
import { parseExponentCode } from '../transformer/ExponentNormalizer.ts';

import type { EventRecord, ExtractResult, RawDataset } from '../model/Models.ts';
import type { Logger } from 'pino';

/**
 * Column names of the NOAA storm database export
 */
export const STORM_COLUMNS = {
    eventType: 'EVTYPE',
    fatalities: 'FATALITIES',
    injuries: 'INJURIES',
    propertyDamage: 'PROPDMG',
    propertyDamageExp: 'PROPDMGEXP',
    cropDamage: 'CROPDMG',
    cropDamageExp: 'CROPDMGEXP',
} as const;

const DECIMAL_PATTERN = /^\d+(\.\d+)?([eE][+-]?\d+)?$/;

/**
 * Parses a non-negative decimal number from a CSV cell, or null when it can't.
 * Hex, binary and octal literals are not accepted.
 */
export function parseMagnitude(raw: string | undefined): number | null {
    if (raw === undefined) return null;
    const trimmed = raw.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) return null;

    const value = Number(trimmed);
    return Number.isFinite(value) && value >= 0 ? value : null;
}

/**
 * Turns the raw storm data CSV into EventRecords.
 * Only the impact columns are read; the other ~30 columns are ignored.
 */
export class StormEventExtractor {
    private logger: Logger;

    constructor() {
        this.logger = createLogger('StormEventExtractor');
    }

    extract(raw: RawDataset): ExtractResult {
        this.logger.info(`Extracting records from ${raw.sourceName}...`);

        const rows = csvParse(raw.data);
        const required = Object.values(STORM_COLUMNS);
        const missing = required.filter((c) => !rows.columns.includes(c));
        if (missing.length > 0) {
            let err: string = `Missing expected column(s): ${missing.join(', ')}. Found: ${rows.columns.join(', ')}`;
            this.logger.error(err);
            throw new Error(err);
        }

        const records: EventRecord[] = [];
        let unlabeled = 0;

        for (const row of rows) {
            const eventType = row[STORM_COLUMNS.eventType] ?? '';
            if (eventType === '') {
                unlabeled++;
            }

            records.push({
                eventType,
                fatalities: parseMagnitude(row[STORM_COLUMNS.fatalities]),
                injuries: parseMagnitude(row[STORM_COLUMNS.injuries]),
                propertyDamage: parseMagnitude(row[STORM_COLUMNS.propertyDamage]),
                propertyDamageExp: parseExponentCode(row[STORM_COLUMNS.propertyDamageExp]),
                cropDamage: parseMagnitude(row[STORM_COLUMNS.cropDamage]),
                cropDamageExp: parseExponentCode(row[STORM_COLUMNS.cropDamageExp]),
            });
        }

        this.logger.info(`Extraction complete: ${records.length} records`);
        if (unlabeled > 0) {
            this.logger.warn(`${unlabeled} rows have no event type, kept under an empty label`);
        }

        return { records, sourceName: raw.sourceName };
    }
}
