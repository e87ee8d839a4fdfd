/**
 * blur.ts -- Gaussian-blur an image file.
 *
 * Defaults come from BLUR_* variables, optionally set in a .env file in the
 * working directory; flags override them.
 *
 * Usage:
 *   npx tsx scripts/blur.ts photo.jpg                      # -> photo_blurred_10x10.jpg
 *   npx tsx scripts/blur.ts -r 3 -s 1.5 -t 8 photo.jpg out.png
 *   npx tsx scripts/blur.ts --sequential photo.jpg
 */

import path from 'node:path';
import { blurParallel, blurSequential } from '../src/blur.js';
import { loadBlurConfig, loadEnvFile } from '../src/config.js';
import { loadRgbImage, saveRgbImage } from '../src/image-io.js';
import { parseBlurArgs, usageText } from '../src/options.js';
import { silentLogger } from '../src/types.js';

async function main(): Promise<void> {
  loadEnvFile(path.resolve('.env'));
  const defaults = loadBlurConfig();
  const parsed = parseBlurArgs(process.argv.slice(2), defaults);

  if (parsed.help) {
    console.log(usageText(defaults));
    return;
  }

  const { radius, sigma, threads, batchSize, source, destination, sequential, quiet } = parsed;
  const logger = quiet ? silentLogger : console;

  const original = await loadRgbImage(source);
  const start = performance.now();
  const blurred = sequential
    ? blurSequential(radius, sigma, original, { logger })
    : await blurParallel(radius, sigma, threads, original, { logger, batchSize });
  const elapsed = ((performance.now() - start) / 1000).toFixed(2);

  await saveRgbImage(blurred, destination);
  console.log(`Wrote ${destination} (${elapsed}s)`);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
