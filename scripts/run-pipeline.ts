/**
 * Run the pipeline on a synthetic recording and print a summary.
 *
 * Sampling parameters come from the environment (see .env.example):
 *   npm run demo
 */

import 'dotenv/config';
import { parseDurationSeconds, samplingConfigFromEnvironment } from '../src/config';
import { runPipeline } from '../src/pipeline';
import { generateSyntheticEEG } from '../src/signal/synthetic';
import { configureFromEnvironment, createLogger } from '../src/utils/logger';
import { PipelineError } from '../src/utils/errors';

configureFromEnvironment();
const logger = createLogger('demo');

function main(): void {
  const config = samplingConfigFromEnvironment();
  const channels = config.channelCount ?? 8;
  const durationSeconds = parseDurationSeconds(process.argv[2]);

  const raw = generateSyntheticEEG({
    channels,
    duration: durationSeconds,
    sampleRate: config.samplingRate,
    dcOffset: 40,
  });

  const result = runPipeline(raw, { ...config, channelCount: channels });

  console.log(`Channels: ${result.info.channelsOriginal} -> ${result.info.channelsClean}`);
  console.log(`Samples: ${result.info.samplesClean}`);
  console.log(`Artifacts: ${result.info.artifactPercentage.toFixed(1)}%`);
  console.log(`Dead channels: ${result.info.deadChannelIndices.join(', ') || 'none'} (${result.info.interpolation})`);
  console.log(`Feature matrix: ${result.features.features.length} x ${result.features.featureNames.length}`);

  const first = result.features.features[0];
  result.features.featureNames.slice(0, 15).forEach((name, i) => {
    console.log(`  ${name.padEnd(22)} ${first[i].toFixed(4)}`);
  });
}

try {
  main();
} catch (error) {
  if (error instanceof PipelineError) {
    logger.error('Pipeline failed', error);
    process.exit(1);
  }
  throw error;
}
