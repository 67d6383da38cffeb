/**
 * Info Command
 * 
 * Show the metadata the splitter works from.
 */

import ora from 'ora';
import chalk from 'chalk';
import { SceneCutError, getBinaryPath } from '@scenecut/core';
import { MediaProbe } from '@scenecut/media';
import { validateInput } from '@scenecut/pipeline';
import { formatBytes, formatDuration } from '@scenecut/utils';
import { printError, printHeader, printKeyValue } from '../lib/output.js';

export async function infoCommand(input: string): Promise<void> {
  const spinner = ora('Reading media info...').start();

  try {
    await validateInput(input);
    const metadata = await new MediaProbe({ ffprobePath: getBinaryPath('ffprobe') }).probe(input);
    spinner.stop();

    printHeader('Media Info');
    printKeyValue('File', input);
    printKeyValue('Format', metadata.formatName);
    printKeyValue('Duration', `${formatDuration(metadata.duration)} (${metadata.duration.toFixed(2)}s)`);
    printKeyValue('Resolution', metadata.width > 0 ? `${metadata.width}x${metadata.height}` : chalk.gray('no video'));
    printKeyValue('Frame rate', metadata.frameRate > 0 ? `${metadata.frameRate.toFixed(3)} fps` : chalk.gray('unknown'));
    printKeyValue('Audio', metadata.audioSampleRate !== undefined ? `${metadata.audioSampleRate} Hz` : chalk.gray('none'));
    printKeyValue('Size', formatBytes(metadata.fileSizeBytes));
    console.log();
  } catch (error) {
    spinner.fail('Could not read media info');

    if (error instanceof SceneCutError) {
      printError(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}
