// src/index.ts

import { loadConfig } from './config/Config.ts';
import { StormDataSource } from './source/StormDataSource.ts';
import { StormEventExtractor } from './extractor/StormEventExtractor.ts';
import { runImpactPipeline } from './pipeline/ImpactPipeline.ts';
import { renderImpactReport } from './report/BarChartRenderer.ts';
import { createLogger } from './utils/Logger.ts';

//central logger init
const logger = createLogger('app');
logger.info('Application starting...');

async function main() {
  const config = loadConfig();

  logger.info("storm impact analysis starting...");

  const dataSource = new StormDataSource(config.dataSource);
  const extractor = new StormEventExtractor();

  try {
    //step one: load the raw csv
    const rawDataset = await dataSource.fetchRaw();
    //step two: parse rows into event records
    const extracted = extractor.extract(rawDataset);
    //step three: normalize, aggregate and rank
    const report = runImpactPipeline(extracted.records, {
      topN: config.topN,
      canonicalizeLabels: config.canonicalizeLabels,
    });
    logger.info(`Ranked ${report.groupCount} event types from ${report.recordCount} records`);

    console.log('\n' + renderImpactReport(report, config.chartWidth).join('\n') + '\n');
  } catch (err) {
    logger.error({ originalError: err }, "Storm impact analysis failed");
    if (err instanceof Error) {
      logger.error(err.stack);
    }
    throw err;
  }
}

await main();
