/**
 * CLI Write Command
 */

import { HostWriter } from '../src/host/index.js';
import { CLI_DEFAULTS } from '../src/utils/constants.js';
import { formatBytes } from '../src/utils/helpers.js';
import { savePatternFile } from './pattern-io.js';
import {
  EXIT,
  UsageError,
  errorMessage,
  parseGrid,
  parseLevels,
  parseScheme,
  readPayload,
  withCoreLogs,
} from './options.js';

export interface WriteOptions {
  file?: string;
  output?: string;
  grid: string;
  levels: string;
  ecc: string;
  scramble: boolean;
  quiet?: boolean;
  json?: boolean;
}

export async function writeCommand(text: string | undefined, options: WriteOptions): Promise<number> {
  const muted = Boolean(options.quiet || options.json);
  const log = muted ? () => {} : console.error.bind(console);

  try {
    return await withCoreLogs(muted, async () => {
      const data = readPayload(text, options.file);
      const host = new HostWriter({
        gridSize: parseGrid(options.grid),
        ...parseLevels(options.levels),
        errorCorrection: parseScheme(options.ecc),
        scramble: options.scramble,
      });

      log(`Writing ${formatBytes(data.length)} into a ${options.grid} lattice...`);
      const pattern = host.write(data);
      const output = options.output ?? CLI_DEFAULTS.OUTPUT;
      savePatternFile(output, pattern);

      if (options.json) {
        console.log(JSON.stringify({ success: true, output, scrambled: options.scramble, summary: pattern.summary() }, null, 2));
        return EXIT.OK;
      }

      log(`Bits/voxel: ${pattern.bitsPerVoxel}`);
      log(`Encoded:    ${pattern.encodedBitLength} bits (${pattern.errorCorrection.name})`);
      log(`Padding:    ${pattern.paddingBits} bits`);
      console.error(`Voxels:  ${pattern.voxelCount}`);
      console.error(`Output:  ${output}`);
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
