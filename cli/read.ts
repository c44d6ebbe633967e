/**
 * CLI Read Command
 */

import { writeFileSync } from 'fs';
import { readBack } from '../src/host/index.js';
import { applyGaussianNoise } from '../src/lib/noise.js';
import type { Voxel } from '../src/lib/voxel.js';
import { bytesToString } from '../src/utils/helpers.js';
import { loadPatternFile } from './pattern-io.js';
import { EXIT, UsageError, errorMessage, parseSeed, parseStd, withCoreLogs } from './options.js';

export interface ReadOptions {
  output?: string;
  noiseIntensity?: string;
  noisePolarization?: string;
  seed?: string;
  scramble: boolean;
  quiet?: boolean;
  json?: boolean;
}

export async function readCommand(filePath: string, options: ReadOptions): Promise<number> {
  const muted = Boolean(options.quiet || options.json);
  const log = muted ? () => {} : console.error.bind(console);

  try {
    return await withCoreLogs(muted, async () => {
      const intensityStd = parseStd(options.noiseIntensity, '--noise-intensity');
      const polarizationStd = parseStd(options.noisePolarization, '--noise-polarization');
      const seed = parseSeed(options.seed);

      log(`Reading ${filePath}...`);
      const pattern = loadPatternFile(filePath);
      log(`Voxels: ${pattern.voxelCount}, FEC: ${pattern.errorCorrection.name}`);

      let voxels: Voxel[] | undefined;
      if (intensityStd > 0 || polarizationStd > 0) {
        log(`Applying noise: intensity σ=${intensityStd}, polarization σ=${polarizationStd}`);
        voxels = applyGaussianNoise(pattern, intensityStd, polarizationStd, seed);
      }

      const { data, readResult } = readBack(pattern, { scramble: options.scramble }, voxels);
      const text = bytesToString(data);

      if (options.output) {
        writeFileSync(options.output, data);
      }

      if (options.json) {
        console.log(JSON.stringify({
          success: true,
          message: text,
          bytes: data.length,
          correctedErrors: readResult.correctedErrors,
          detectedUncorrectable: readResult.detectedUncorrectable,
          voxelsUsed: readResult.voxelsUsed,
          output: options.output,
        }, null, 2));
        return EXIT.OK;
      }

      if (!options.output) {
        process.stdout.write(text);
        if (!text.endsWith('\n')) {
          process.stdout.write('\n');
        }
      }

      console.error(`Message:       ${data.length} bytes`);
      console.error(`Corrected:     ${readResult.correctedErrors}`);
      console.error(`Uncorrectable: ${readResult.detectedUncorrectable}`);
      if (options.output) {
        console.error(`Output:        ${options.output}`);
      }
      return EXIT.OK;
    });
  } catch (error) {
    if (options.json) {
      console.log(JSON.stringify({ success: false, error: errorMessage(error) }, null, 2));
    } else {
      console.error('Error:', errorMessage(error));
    }
    return error instanceof UsageError ? EXIT.USAGE : EXIT.FAILURE;
  }
}
