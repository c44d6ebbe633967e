/**
 * CLI Simulate Command
 *
 * Write → (noise) → read in memory and report whether the payload survived
 */

import { HostWriter } from '../src/host/index.js';
import { applyGaussianNoise } from '../src/lib/noise.js';
import {
  EXIT,
  UsageError,
  errorMessage,
  parseGrid,
  parseLevels,
  parseScheme,
  parseSeed,
  parseStd,
  readPayload,
  withCoreLogs,
} from './options.js';

export interface SimulateOptions {
  file?: string;
  grid: string;
  levels: string;
  ecc: string;
  scramble: boolean;
  noiseIntensity?: string;
  noisePolarization?: string;
  seed?: string;
  quiet?: boolean;
  json?: boolean;
}

export async function simulateCommand(text: string | undefined, options: SimulateOptions): Promise<number> {
  const muted = Boolean(options.quiet || options.json);

  try {
    return await withCoreLogs(muted, async () => {
      const data = readPayload(text, options.file);
      const intensityStd = parseStd(options.noiseIntensity, '--noise-intensity');
      const polarizationStd = parseStd(options.noisePolarization, '--noise-polarization');
      const seed = parseSeed(options.seed);

      const host = new HostWriter({
        gridSize: parseGrid(options.grid),
        ...parseLevels(options.levels),
        errorCorrection: parseScheme(options.ecc),
        scramble: options.scramble,
      });

      const pattern = host.write(data);
      const voxels = intensityStd > 0 || polarizationStd > 0
        ? applyGaussianNoise(pattern, intensityStd, polarizationStd, seed)
        : undefined;
      const readback = host.verify(pattern, voxels, data);
      const { readResult } = readback;

      if (options.json) {
        console.log(JSON.stringify({
          success: readback.ok,
          voxels: pattern.voxelCount,
          correctedErrors: readResult.correctedErrors,
          detectedUncorrectable: readResult.detectedUncorrectable,
          summary: pattern.summary(),
        }, null, 2));
      } else {
        console.log(`Wrote pattern with ${pattern.voxelCount} voxels; corrected errors: ${readResult.correctedErrors}`);
        console.log(`Roundtrip: ${readback.ok ? 'OK' : 'MISMATCH'}`);
      }

      return readback.ok ? EXIT.OK : EXIT.FAILURE;
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
