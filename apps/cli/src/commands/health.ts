/**
 * Health Command
 * 
 * Check that ffmpeg and ffprobe resolve and run.
 */

import ora from 'ora';
import chalk from 'chalk';
import {
  binaries,
  errorMessage,
  getBinaryFolders,
  getBinaryVersion,
  type BinaryConfig,
} from '@scenecut/core';
import { printError, printHeader, printKeyValue, printSuccess } from '../lib/output.js';

interface ToolHealth {
  config: BinaryConfig;
  version?: string;
  error?: string;
}

async function checkTool(config: BinaryConfig): Promise<ToolHealth> {
  try {
    return { config, version: await getBinaryVersion(config.resolvedPath) };
  } catch (error) {
    return { config, error: errorMessage(error) };
  }
}

export async function healthCommand(): Promise<void> {
  const spinner = ora('Checking external tools...').start();
  const tools = binaries();
  const results = [await checkTool(tools.ffmpeg), await checkTool(tools.ffprobe)];
  spinner.stop();

  printHeader('Tool Health');

  for (const { config, version, error } of results) {
    const status = error === undefined ? chalk.green('[OK]') : chalk.red('[ERR]');
    console.log(`  ${status} ${config.name.padEnd(8)} ${config.resolvedPath} ${chalk.gray(`(${config.source})`)}`);
    console.log(`       ${chalk.gray(version ?? error ?? '')}`);
  }

  console.log();
  printKeyValue('Bundled folder', getBinaryFolders().os);
  console.log();

  if (results.every(r => r.error === undefined)) {
    printSuccess('ffmpeg and ffprobe are ready');
  } else {
    printError('Some tools are missing; set FFMPEG_PATH / FFPROBE_PATH or install ffmpeg');
    process.exitCode = 1;
  }
}
