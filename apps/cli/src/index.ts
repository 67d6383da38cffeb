#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for scenecut. `split` is the default command, so
 * `scenecut video.mp4 --auto-detect` works without naming it.
 */

// Must stay first: fills process.env before the shared logger is created
import './config/env.js';
import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '@scenecut/core';
import { setLogLevel } from '@scenecut/utils';
import { cliLogLevel, loadSettings, type Settings } from './config/index.js';
import { parseSeconds, parseThreshold } from './lib/options.js';
import { printError } from './lib/output.js';

// Commands
import { splitCommand, type SplitCommandOptions } from './commands/split.js';
import { infoCommand } from './commands/info.js';
import { healthCommand } from './commands/health.js';

let settings: Settings;
try {
  settings = loadSettings();
} catch (error) {
  printError(`Invalid environment configuration: ${errorMessage(error)}`);
  process.exit(1);
}

setLogLevel(cliLogLevel(settings));

const program = new Command();

program
  .name('scenecut')
  .description('Split videos into clips at scene boundaries')
  .version('1.0.0')
  .option('--debug', 'Enable debug logging');

program.hook('preAction', (thisCommand) => {
  setLogLevel(cliLogLevel(settings, thisCommand.opts<{ debug?: boolean }>().debug === true));
});

// ============================================
// SPLIT
// ============================================

program
  .command('split', { isDefault: true })
  .description('Split videos into clips')
  .argument('<inputs...>', 'Video files to split')
  .option('-o, --output-dir <dir>', `Output root (default: ${settings.outputDir})`)
  .option('-a, --auto-detect', 'Cut at detected scene changes')
  .option('-e, --equal-parts <n>', 'Cut into n equal parts')
  .option('-t, --timestamps <ranges...>', 'Cut explicit start,end ranges in seconds')
  .option('-m, --min-scene-duration <seconds>', `Minimum scene length for detection (default: ${settings.minSceneDuration})`, parseSeconds)
  .option('-p, --padding <seconds>', `Trim at each detected cut (default: ${settings.paddingSeconds})`, parseSeconds)
  .option('--threshold <score>', `Scene change score, 0-1 (default: ${settings.sceneThreshold})`, parseThreshold)
  .option('--prefix <name>', 'Clip file name prefix', 'clip')
  .option('--preset <name>', 'Encoding preset (quality, fast)', 'quality')
  .action((inputs: string[], options: SplitCommandOptions, command: Command) =>
    splitCommand(inputs, options, command, settings)
  );

// ============================================
// DIAGNOSTICS
// ============================================

program
  .command('info <input>')
  .description('Show media info for a video file')
  .action(infoCommand);

program
  .command('health')
  .description('Check that ffmpeg and ffprobe are available')
  .action(healthCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('scenecut --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

try {
  await program.parseAsync();
} catch (error) {
  printError(errorMessage(error));
  if (program.opts<{ debug?: boolean }>().debug && error instanceof Error && error.stack) {
    console.error(chalk.gray(error.stack));
  }
  process.exit(1);
}
