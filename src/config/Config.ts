import { DEFAULT_TOP_N } from '../ranker/Ranker.ts';
import { DEFAULT_CHART_WIDTH } from '../report/BarChartRenderer.ts';

export interface AppConfig {
    dataSource: string;            // local path or http(s) URL
    topN: number;
    canonicalizeLabels: boolean;
    chartWidth: number;
}

/**
 * Reads runner settings from the environment.
 *
 *   STORM_DATA_SOURCE          (required) path or URL of the storm data CSV
 *   STORM_TOP_N                event types per chart, default 10
 *   STORM_CANONICALIZE_LABELS  '1' or 'true' to merge label spellings
 *   STORM_CHART_WIDTH          bar width in characters, default 40
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const dataSource = env.STORM_DATA_SOURCE?.trim();
    if (!dataSource) {
        throw new Error('STORM_DATA_SOURCE not set. Provide a CSV path or URL.');
    }

    return {
        dataSource,
        topN: parsePositiveInt('STORM_TOP_N', env.STORM_TOP_N, DEFAULT_TOP_N),
        canonicalizeLabels: ['1', 'true'].includes(env.STORM_CANONICALIZE_LABELS ?? ''),
        chartWidth: parsePositiveInt('STORM_CHART_WIDTH', env.STORM_CHART_WIDTH, DEFAULT_CHART_WIDTH),
    };
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;

    const value = parseInt(raw, 10);
    if (isNaN(value) || value < 1) {
        throw new Error(`${name} must be a positive integer, got '${raw}'`);
    }
    return value;
}
