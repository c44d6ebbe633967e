/**
 * lattice5d CLI - write payloads into simulated 5D voxel patterns and read them back
 */

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { CLI_DEFAULTS } from '../src/utils/constants.js';
import { writeCommand } from './write.js';
import { readCommand } from './read.js';
import { simulateCommand } from './simulate.js';

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

const version = readVersion();

const program = new Command();

program
  .name('lattice5d')
  .description('Encode data into simulated 5D optical storage patterns.\n\nPayload bits are protected by forward error correction and written as voxels whose intensity and polarization carry the data; reading quantizes the (optionally noisy) measurements back into bits.')
  .version(version)
  .addHelpText('after', `
Examples:
  $ lattice5d write "Hello glass" -o hello.json
  $ lattice5d write -f notes.txt --grid 32x32x4 --levels 16x8 -o notes.json.gz
  $ lattice5d read hello.json
  $ lattice5d read hello.json --noise-intensity 0.02 --seed 7
  $ lattice5d simulate "Hello glass" --ecc parity8`);

program
  .command('write')
  .description('Write a payload into a pattern file')
  .argument('[text]', 'Text to store (or use -f for file input, or pipe from stdin)')
  .option('-f, --file <path>', 'Read the payload from a file')
  .option('-o, --output <path>', `Pattern file path; a .gz suffix compresses it (default: ${CLI_DEFAULTS.OUTPUT})`)
  .option('--grid <XxYxZ>', 'Lattice size', CLI_DEFAULTS.GRID)
  .option('--levels <IxP>', 'Intensity levels x polarization states (powers of two)', CLI_DEFAULTS.LEVELS)
  .option('--ecc <scheme>', 'Error correction: none, hamming74 or parity8', CLI_DEFAULTS.ECC)
  .option('--no-scramble', 'Disable the payload scrambler')
  .option('-q, --quiet', 'Suppress progress output (only show result)')
  .option('--json', 'Output result as JSON')
  .action(async (text, options) => {
    process.exitCode = await writeCommand(text, options);
  });

program
  .command('read')
  .description('Read a pattern file back into its payload')
  .argument('<pattern>', 'Pattern file to read (.json or .json.gz)')
  .option('-o, --output <path>', 'Write the payload to a file instead of stdout')
  .option('--noise-intensity <std>', 'Gaussian noise on intensity measurements')
  .option('--noise-polarization <std>', 'Gaussian noise on polarization measurements')
  .option('--seed <n>', 'Seed for the noise generator')
  .option('--no-scramble', 'The pattern was written without the scrambler')
  .option('-q, --quiet', 'Suppress progress output (only show result)')
  .option('--json', 'Output result as JSON')
  .action(async (file, options) => {
    process.exitCode = await readCommand(file, options);
  });

program
  .command('simulate')
  .description('Write, optionally add noise, and read back in memory')
  .argument('[text]', 'Text to store (or use -f for file input, or pipe from stdin)')
  .option('-f, --file <path>', 'Read the payload from a file')
  .option('--grid <XxYxZ>', 'Lattice size', CLI_DEFAULTS.GRID)
  .option('--levels <IxP>', 'Intensity levels x polarization states (powers of two)', CLI_DEFAULTS.LEVELS)
  .option('--ecc <scheme>', 'Error correction: none, hamming74 or parity8', CLI_DEFAULTS.ECC)
  .option('--no-scramble', 'Disable the payload scrambler')
  .option('--noise-intensity <std>', 'Gaussian noise on intensity measurements')
  .option('--noise-polarization <std>', 'Gaussian noise on polarization measurements')
  .option('--seed <n>', 'Seed for the noise generator')
  .option('-q, --quiet', 'Suppress progress output (only show result)')
  .option('--json', 'Output result as JSON')
  .action(async (text, options) => {
    process.exitCode = await simulateCommand(text, options);
  });

await program.parseAsync();
