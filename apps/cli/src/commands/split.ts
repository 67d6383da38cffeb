/**
 * Split Command
 * 
 * Split one or more videos into clips.
 */

import { resolve } from 'node:path';
import ora from 'ora';
import chalk from 'chalk';
import type { Command } from 'commander';
import { SceneCutError, binaries, isBinaryAvailable } from '@scenecut/core';
import { SplitOrchestrator, ProcessingSession, type BatchSummary, type SplitOptions } from '@scenecut/pipeline';
import { DEFAULT_CLIP_PRESET, getClipPreset, type ClipEncodingPreset } from '@scenecut/processing';
import type { Settings } from '../config/index.js';
import { resolveSplitMode, type ModeFlags } from '../lib/options.js';
import { describeClipFailures, describeEvent, formatReportLine } from '../lib/progress.js';
import { printError, printHeader, printKeyValue, printSuccess, printWarning } from '../lib/output.js';

export interface SplitCommandOptions extends ModeFlags {
  outputDir?: string;
  minSceneDuration?: number;
  padding?: number;
  threshold?: number;
  prefix?: string;
  preset?: string;
}

export async function splitCommand(
  inputs: string[],
  options: SplitCommandOptions,
  command: Command,
  settings: Settings
): Promise<void> {
  let splitOptions: SplitOptions;
  let encoding: ClipEncodingPreset;

  try {
    splitOptions = {
      mode: resolveSplitMode(options),
      minSceneDuration: options.minSceneDuration ?? settings.minSceneDuration,
      paddingSeconds: options.padding ?? settings.paddingSeconds,
      minClipDuration: settings.minClipDuration,
    };
    encoding = getClipPreset(options.preset ?? DEFAULT_CLIP_PRESET);
  } catch (error) {
    if (!(error instanceof SceneCutError)) throw error;
    printError(error.message);
    command.outputHelp({ error: true });
    process.exitCode = 1;
    return;
  }

  const tools = binaries();
  for (const tool of [tools.ffmpeg, tools.ffprobe]) {
    if (!(await isBinaryAvailable(tool.resolvedPath))) {
      printError(`${tool.name} is not runnable at ${tool.resolvedPath}`);
      console.log(chalk.gray(`Install it, put it on PATH, or set ${tool.envVar}`));
      process.exitCode = 1;
      return;
    }
  }

  const outputRoot = resolve(options.outputDir ?? settings.outputDir);
  const orchestrator = new SplitOrchestrator({
    ffmpegPath: tools.ffmpeg.resolvedPath,
    ffprobePath: tools.ffprobe.resolvedPath,
    threshold: options.threshold ?? settings.sceneThreshold,
    prefix: options.prefix,
    encoding,
  });

  const session = new ProcessingSession();
  const spinner = ora();

  session.onEvent((event) => {
    const text = describeEvent(event);

    if (event.type === 'file-start' && text) {
      spinner.start(text);
    } else if (event.type === 'file-complete') {
      const line = formatReportLine(event.report);
      if (event.report.succeeded) {
        spinner.succeed(line);
        describeClipFailures(event.report).forEach(failure => printWarning(failure));
      } else {
        spinner.fail(line);
      }
    } else if (text) {
      spinner.text = text;
    }
  });

  const onInterrupt = (): void => {
    session.requestCancel();
    spinner.text = `${spinner.text} ${chalk.yellow('(stopping after this file)')}`;
  };
  process.once('SIGINT', onInterrupt);

  let summary: BatchSummary;
  try {
    summary = await orchestrator.processMany(inputs, outputRoot, splitOptions, session);
  } finally {
    process.off('SIGINT', onInterrupt);
    if (spinner.isSpinning) spinner.stop();
  }

  printSummary(summary, outputRoot);

  if (summary.succeeded === 0) {
    process.exitCode = 1;
  }
}

function printSummary(summary: BatchSummary, outputRoot: string): void {
  printHeader('Summary');
  printKeyValue('Succeeded', summary.succeeded);
  printKeyValue('Failed', summary.failed);
  if (summary.skipped > 0) {
    printKeyValue('Skipped', summary.skipped);
  }
  printKeyValue('Output', outputRoot);
  console.log();

  if (summary.cancelled) {
    printWarning(`Cancelled with ${summary.skipped} of ${summary.total} inputs not started`);
  } else if (summary.succeeded === summary.total) {
    printSuccess(`All ${summary.total} inputs split`);
  } else if (summary.succeeded === 0) {
    printError('No input produced any clips');
  } else {
    printWarning(`${summary.failed} of ${summary.total} inputs failed`);
  }
}
