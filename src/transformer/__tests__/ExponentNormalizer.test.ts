import { describe, test, expect } from 'vitest';
import {
    ExponentNormalizer,
    parseExponentCode,
    resolveExponent,
} from '../ExponentNormalizer.ts';
import { AnomalyLog } from '../AnomalyLog.ts';
import type { EventRecord, ExponentCode } from '../../model/Models.ts';

// ── Test helpers ──

const sym = (symbol: string): ExponentCode => ({ kind: 'symbol', symbol });
const BLANK: ExponentCode = { kind: 'blank' };

function makeRecord(overrides: Partial<EventRecord> = {}): EventRecord {
    return {
        eventType: 'HAIL',
        fatalities: 0,
        injuries: 0,
        propertyDamage: 0,
        propertyDamageExp: BLANK,
        cropDamage: 0,
        cropDamageExp: BLANK,
        ...overrides,
    };
}

// ── Tests ──

describe('resolveExponent', () => {
    test('multiplier table', () => {
        const expected: Array<[ExponentCode, number]> = [
            [BLANK, 0],
            [sym('-'), 0],
            [sym('?'), 0],
            [sym('+'), 1],
            [sym('h'), 100],
            [sym('H'), 100],
            [sym('k'), 1_000],
            [sym('K'), 1_000],
            [sym('m'), 1_000_000],
            [sym('M'), 1_000_000],
            [sym('b'), 1_000_000_000],
            [sym('B'), 1_000_000_000],
        ];

        for (const [code, multiplier] of expected) {
            expect(resolveExponent(code).multiplier).toBe(multiplier);
        }
    });

    test('digits 0 through 8 all mean tens', () => {
        for (const digit of ['0', '1', '2', '3', '4', '5', '6', '7', '8']) {
            expect(resolveExponent(sym(digit))).toEqual({ multiplier: 10 });
        }
    });

    test('? resolves to 0 but is flagged as unknown', () => {
        expect(resolveExponent(sym('?'))).toEqual({
            multiplier: 0,
            anomaly: 'unknown_exponent_code',
        });
    });

    test('blank, - and + carry no anomaly', () => {
        expect(resolveExponent(BLANK)).toEqual({ multiplier: 0 });
        expect(resolveExponent(sym('-'))).toEqual({ multiplier: 0 });
        expect(resolveExponent(sym('+'))).toEqual({ multiplier: 1 });
    });

    test('codes outside the table are unmapped', () => {
        for (const code of ['9', 'x', 'T', 'KK', ' K', 'constructor']) {
            expect(resolveExponent(sym(code))).toEqual({
                multiplier: 0,
                anomaly: 'unmapped_exponent_code',
            });
        }
    });
});

describe('parseExponentCode', () => {
    test('empty and whitespace-only cells are blank', () => {
        expect(parseExponentCode('')).toEqual(BLANK);
        expect(parseExponentCode('   ')).toEqual(BLANK);
        expect(parseExponentCode(undefined)).toEqual(BLANK);
    });

    test('other text is kept verbatim, case included', () => {
        expect(parseExponentCode('k')).toEqual(sym('k'));
        expect(parseExponentCode('K')).toEqual(sym('K'));
        expect(parseExponentCode('?')).toEqual(sym('?'));
    });
});

describe('ExponentNormalizer', () => {
    test('unmapped code returns 0 and is counted once per lookup', () => {
        const log = new AnomalyLog();
        const normalizer = new ExponentNormalizer(log);

        expect(normalizer.multiplierFor(sym('9'))).toBe(0);
        expect(normalizer.multiplierFor(sym('9'))).toBe(0);
        expect(normalizer.multiplierFor(sym('x'))).toBe(0);

        const summary = log.summary();
        expect(summary.byKind.unmapped_exponent_code).toBe(3);
        expect(summary.unmappedCodes).toEqual({ '9': 2, x: 1 });
        expect(summary.total).toBe(3);
    });

    test('valid codes leave the log untouched', () => {
        const log = new AnomalyLog();
        const normalizer = new ExponentNormalizer(log);

        expect(normalizer.multiplierFor(sym('M'))).toBe(1_000_000);
        expect(normalizer.multiplierFor(BLANK)).toBe(0);
        expect(log.total).toBe(0);
    });

    test('normalize: property and crop damage scaled independently', () => {
        const normalizer = new ExponentNormalizer();
        const result = normalizer.normalize(makeRecord({
            eventType: 'FLOOD',
            propertyDamage: 3,
            propertyDamageExp: sym('M'),
            cropDamage: 1,
            cropDamageExp: sym('K'),
        }));

        expect(result).toEqual({
            eventType: 'FLOOD',
            propertyDamage: 3_000_000,
            cropDamage: 1_000,
            totalDamage: 3_001_000,
        });
    });

    test('property code ? contributes 0 and raises exactly one anomaly', () => {
        const log = new AnomalyLog();
        const normalizer = new ExponentNormalizer(log);
        const result = normalizer.normalize(makeRecord({
            propertyDamage: 50,
            propertyDamageExp: sym('?'),
        }));

        expect(result.propertyDamage).toBe(0);
        expect(result.totalDamage).toBe(0);
        expect(log.total).toBe(1);
        expect(log.summary().byKind.unknown_exponent_code).toBe(1);
    });

    test('missing magnitude counts as malformed and contributes 0', () => {
        const log = new AnomalyLog();
        const normalizer = new ExponentNormalizer(log);
        const result = normalizer.normalize(makeRecord({
            propertyDamage: null,
            propertyDamageExp: sym('K'),
            cropDamage: 2,
            cropDamageExp: sym('K'),
        }));

        expect(result.propertyDamage).toBe(0);
        expect(result.cropDamage).toBe(2_000);
        expect(log.summary().byKind.malformed_numeric).toBe(1);
    });
});
