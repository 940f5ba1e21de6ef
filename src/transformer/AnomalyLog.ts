import { ANOMALY_KINDS } from '../model/Models.ts';
import type { AnomalyKind, AnomalySummary } from '../model/Models.ts';

/**
 * Counts data-quality anomalies seen during one aggregation pass.
 * Owned by a single pass; read it back with summary() when done.
 */
export class AnomalyLog {
    private counts: Record<AnomalyKind, number> = AnomalyLog.emptyCounts();
    private unmappedCodes = new Map<string, number>();

    record(kind: AnomalyKind, code?: string): void {
        this.counts[kind]++;
        if (kind === 'unmapped_exponent_code' && code !== undefined) {
            this.unmappedCodes.set(code, (this.unmappedCodes.get(code) ?? 0) + 1);
        }
    }

    /** True the first time a given unmapped code is recorded */
    isFirstSighting(code: string): boolean {
        return this.unmappedCodes.get(code) === 1;
    }

    get total(): number {
        return Object.values(this.counts).reduce((sum, n) => sum + n, 0);
    }

    summary(): AnomalySummary {
        return {
            total: this.total,
            byKind: { ...this.counts },
            unmappedCodes: Object.fromEntries(this.unmappedCodes),
        };
    }

    static emptyCounts(): Record<AnomalyKind, number> {
        return {
            unmapped_exponent_code: 0,
            unknown_exponent_code: 0,
            malformed_numeric: 0,
            missing_event_type: 0,
        };
    }
}

/**
 * Adds two anomaly summaries together
 */
export function mergeAnomalySummaries(a: AnomalySummary, b: AnomalySummary): AnomalySummary {
    const byKind = AnomalyLog.emptyCounts();
    for (const kind of ANOMALY_KINDS) {
        byKind[kind] = a.byKind[kind] + b.byKind[kind];
    }

    const unmappedCodes: Record<string, number> = { ...a.unmappedCodes };
    for (const [code, count] of Object.entries(b.unmappedCodes)) {
        unmappedCodes[code] = (unmappedCodes[code] ?? 0) + count;
    }

    return { total: a.total + b.total, byKind, unmappedCodes };
}
