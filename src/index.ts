import { config } from './config';
import { runClassification } from './classification/pipeline';
import { loadAdRecords, loadOrganicRecords } from './datasets/sources';
import { formatOutput, saveOutputs } from './output/formatter';
import { Cache } from './utils/cache';
import { logger } from './utils/logger';

async function main(): Promise<void> {
  const options = config.classification;

  logger.banner('📈 Reel Virality Labeler', [
    `Window: ${options.windowSize} posts (${options.windowDirection})`,
    `Viral multiplier: ${options.viralMultiplier}`,
    `Cap: ${options.maxPostsPerAccount} posts/account, min ${options.minPostsPerAccount}`,
    `Top fraction: ${options.topFraction}`,
  ]);

  const cache = new Cache(config.cacheHours);
  const startTime = Date.now();

  try {
    logger.step(1, 3, 'Loading datasets');
    const organic = await loadOrganicRecords(config, cache);
    const ad = loadAdRecords(config);

    logger.step(2, 3, 'Labeling viral posts');
    const result = runClassification({ organic, ad }, options);

    logger.step(3, 3, 'Saving outputs');
    const deliverable = formatOutput(result);
    const saved = saveOutputs(deliverable);

    const elapsedSeconds = ((Date.now() - startTime) / 1000).toFixed(1);
    logger.banner('✅ LABELING COMPLETE', [
      `Total time: ${elapsedSeconds}s`,
      `Viral: ${result.summary.viralPosts} / ${result.summary.totalPosts} posts`,
      `Saved: ${saved.jsonPath}`,
    ]);
  } catch (error) {
    logger.error('Pipeline failed', error);
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch(error => {
    logger.error('Unhandled failure', error);
    process.exit(1);
  });
}
