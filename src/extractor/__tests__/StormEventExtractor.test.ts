import { describe, test, expect } from 'vitest';
import { StormEventExtractor, parseMagnitude } from '../StormEventExtractor.ts';
import type { RawDataset } from '../../model/Models.ts';

// ── Test helpers ──

const HEADER = 'STATE__,BGN_DATE,EVTYPE,FATALITIES,INJURIES,PROPDMG,PROPDMGEXP,CROPDMG,CROPDMGEXP,REFNUM';

function makeRawDataset(lines: string[]): RawDataset {
    return { format: 'csv', data: lines.join('\n'), sourceName: 'test_source' };
}

// ── Tests ──

describe('parseMagnitude', () => {
    test('plain and decimal numbers', () => {
        expect(parseMagnitude('25')).toBe(25);
        expect(parseMagnitude('2.50')).toBe(2.5);
        expect(parseMagnitude(' 7 ')).toBe(7);
        expect(parseMagnitude('1e3')).toBe(1000);
    });

    test('empty, non-numeric and negative values are null', () => {
        expect(parseMagnitude('')).toBeNull();
        expect(parseMagnitude('   ')).toBeNull();
        expect(parseMagnitude(undefined)).toBeNull();
        expect(parseMagnitude('abc')).toBeNull();
        expect(parseMagnitude('-1')).toBeNull();
        expect(parseMagnitude('Infinity')).toBeNull();
        expect(parseMagnitude('0x1A')).toBeNull();
        expect(parseMagnitude('0b11')).toBeNull();
        expect(parseMagnitude('0o7')).toBeNull();
        expect(parseMagnitude('1.')).toBeNull();
    });
});

describe('StormEventExtractor', () => {
    test('happy path: reads the impact columns', () => {
        const raw = makeRawDataset([
            HEADER,
            '1.00,4/18/1950 0:00:00,TORNADO,0.00,15.00,25.00,K,0.00,,1',
            '1.00,4/18/1950 0:00:00,"TSTM WIND ",1.00,0.00,2.50,M,3.00,k,2',
        ]);

        const result = new StormEventExtractor().extract(raw);

        expect(result.sourceName).toBe('test_source');
        expect(result.records).toEqual([
            {
                eventType: 'TORNADO',
                fatalities: 0,
                injuries: 15,
                propertyDamage: 25,
                propertyDamageExp: { kind: 'symbol', symbol: 'K' },
                cropDamage: 0,
                cropDamageExp: { kind: 'blank' },
            },
            {
                eventType: 'TSTM WIND ',
                fatalities: 1,
                injuries: 0,
                propertyDamage: 2.5,
                propertyDamageExp: { kind: 'symbol', symbol: 'M' },
                cropDamage: 3,
                cropDamageExp: { kind: 'symbol', symbol: 'k' },
            },
        ]);
    });

    test('malformed numbers become null, record kept', () => {
        const raw = makeRawDataset([
            HEADER,
            '1.00,4/18/1950 0:00:00,HAIL,n/a,,1.00,?,0.00,,3',
        ]);

        const [record] = new StormEventExtractor().extract(raw).records;

        expect(record.fatalities).toBeNull();
        expect(record.injuries).toBeNull();
        expect(record.propertyDamage).toBe(1);
        expect(record.propertyDamageExp).toEqual({ kind: 'symbol', symbol: '?' });
    });

    test('rows without an event type are kept under an empty label', () => {
        const raw = makeRawDataset([
            HEADER,
            '1.00,4/18/1950 0:00:00,,7.00,3.00,5.00,M,0.00,,1',
            '1.00,4/18/1950 0:00:00,FLOOD,0.00,0.00,0.00,,0.00,,2',
        ]);

        const result = new StormEventExtractor().extract(raw);

        expect(result.records).toHaveLength(2);
        expect(result.records[0].eventType).toBe('');
        expect(result.records[0].fatalities).toBe(7);
        expect(result.records[1].eventType).toBe('FLOOD');
    });

    test('missing columns → throws listing what was found', () => {
        const raw = makeRawDataset(['EVTYPE,FATALITIES', 'TORNADO,1']);

        expect(() => new StormEventExtractor().extract(raw)).toThrow(
            'Missing expected column(s): INJURIES, PROPDMG, PROPDMGEXP, CROPDMG, CROPDMGEXP. Found: EVTYPE, FATALITIES'
        );
    });

    test('header only → 0 records, no crash', () => {
        const result = new StormEventExtractor().extract(makeRawDataset([HEADER]));

        expect(result.records).toHaveLength(0);
    });
});
