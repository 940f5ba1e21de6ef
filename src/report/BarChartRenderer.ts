import { ANOMALY_KINDS } from '../model/Models.ts';

import type { ImpactReport, RankedEntry } from '../model/Models.ts';

export const DEFAULT_CHART_WIDTH = 40;

const BAR_CHAR = '█';

export interface BarChartOptions {
    width?: number;
    formatValue?: (value: number) => string;
}

/**
 * Compact dollar amounts: $1.23B, $4.50M, $25.00K, $950
 */
export function formatDollars(value: number): string {
    if (value >= 1e9) return `$${(value / 1e9).toFixed(2)}B`;
    if (value >= 1e6) return `$${(value / 1e6).toFixed(2)}M`;
    if (value >= 1e3) return `$${(value / 1e3).toFixed(2)}K`;
    return `$${value.toFixed(0)}`;
}

/**
 * Renders ranked entries as a horizontal text bar chart.
 * Bars are scaled to the largest value; any positive value gets at least one block.
 */
export function renderBarChart(
    title: string,
    entries: RankedEntry[],
    options: BarChartOptions = {}
): string[] {
    const width = options.width ?? DEFAULT_CHART_WIDTH;
    const formatValue = options.formatValue ?? String;

    if (entries.length === 0) {
        return [title, '  (no data)'];
    }

    const labelWidth = Math.max(...entries.map((e) => e.eventType.length));
    const max = Math.max(...entries.map((e) => e.value));

    const rows = entries.map((e) => {
        const bar = BAR_CHAR.repeat(barLength(e.value, max, width));
        return `  ${e.eventType.padEnd(labelWidth)} ${bar.padEnd(width)} ${formatValue(e.value)}`;
    });

    return [title, ...rows];
}

function barLength(value: number, max: number, width: number): number {
    if (max <= 0 || value <= 0) return 0;
    return Math.max(1, Math.round((value / max) * width));
}

/**
 * Full console report: headline counts, the three impact charts and the
 * anomaly summary.
 */
export function renderImpactReport(report: ImpactReport, width: number = DEFAULT_CHART_WIDTH): string[] {
    const lines: string[] = [
        '═'.repeat(80),
        `  Records: ${report.recordCount} | Event types: ${report.groupCount} | Anomalies: ${report.anomalies.total}`,
        '═'.repeat(80),
        '',
        ...renderBarChart(`Top ${report.topN} event types by fatalities`, report.rankings.fatalities, { width }),
        '',
        ...renderBarChart(`Top ${report.topN} event types by injuries`, report.rankings.injuries, { width }),
        '',
        ...renderBarChart(
            `Top ${report.topN} event types by economic damage (property + crop)`,
            report.rankings.totalDamage,
            { width, formatValue: formatDollars }
        ),
        '',
        'Anomalies',
    ];

    for (const kind of ANOMALY_KINDS) {
        lines.push(`  ${kind.padEnd(24)} ${report.anomalies.byKind[kind]}`);
    }

    const codes = Object.entries(report.anomalies.unmappedCodes);
    if (codes.length > 0) {
        lines.push(`  unmapped codes: ${codes.map(([code, n]) => `'${code}' ×${n}`).join(', ')}`);
    }

    return lines;
}
