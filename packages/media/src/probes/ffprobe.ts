/**
 * FFProbe Wrapper
 * 
 * Runs ffprobe in quiet JSON mode and validates the document it prints.
 */

import { z } from 'zod';
import { executeCommand, type CommandRunner, type CommandResult } from '@scenecut/utils';
import { TIMEOUTS } from '@scenecut/core';

const streamSchema = z.object({
  index: z.number(),
  codec_type: z.string(),
  codec_name: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  r_frame_rate: z.string().optional(),
  avg_frame_rate: z.string().optional(),
  duration: z.string().optional(),
  sample_rate: z.string().optional(),
  channels: z.number().optional(),
});

const formatSchema = z.object({
  filename: z.string().optional(),
  format_name: z.string().optional(),
  duration: z.string().optional(),
  size: z.string().optional(),
  bit_rate: z.string().optional(),
});

export const ffprobeOutputSchema = z.object({
  streams: z.array(streamSchema).default([]),
  format: formatSchema.optional(),
  error: z.object({
    code: z.number(),
    string: z.string(),
  }).optional(),
});

export type FFProbeResult = z.infer<typeof ffprobeOutputSchema>;
export type FFProbeStream = z.infer<typeof streamSchema>;

export type FFProbeOutcome =
  | { ok: true; result: FFProbeResult }
  | { ok: false; reason: string; stderr?: string };

export interface FFProbeOptions {
  ffprobePath?: string;
  runner?: CommandRunner;
  timeout?: number;
}

export class FFProbe {
  private ffprobePath: string;
  private runner: CommandRunner;
  private timeout: number;

  constructor(options: FFProbeOptions = {}) {
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.runner = options.runner ?? executeCommand;
    this.timeout = options.timeout ?? TIMEOUTS.probeMs;
  }

  /**
   * Probe a media file. Failures are returned, not thrown, so callers can
   * attach their own error type.
   */
  async probe(filePath: string): Promise<FFProbeOutcome> {
    const args = [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      '-show_error',
      filePath,
    ];

    let result: CommandResult;
    try {
      result = await this.runner(this.ffprobePath, args, { timeout: this.timeout });
    } catch (error) {
      return {
        ok: false,
        reason: `ffprobe could not be started: ${error instanceof Error ? error.message : String(error)}`,
      };
    }

    if (result.timedOut) {
      return { ok: false, reason: `ffprobe timed out after ${this.timeout}ms`, stderr: result.stderr };
    }

    const parsed = this.parseOutput(result.stdout);

    if (result.exitCode !== 0) {
      const toolMessage = parsed.ok ? parsed.result.error?.string : undefined;
      return {
        ok: false,
        reason: toolMessage
          ? `ffprobe exited with code ${result.exitCode}: ${toolMessage}`
          : `ffprobe exited with code ${result.exitCode}`,
        stderr: result.stderr,
      };
    }

    return parsed;
  }

  /**
   * Parse and validate ffprobe's JSON document
   */
  parseOutput(stdout: string): FFProbeOutcome {
    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch {
      return { ok: false, reason: `unparseable ffprobe output: ${stdout.substring(0, 200)}` };
    }

    const validated = ffprobeOutputSchema.safeParse(raw);
    if (!validated.success) {
      const issue = validated.error.issues[0];
      const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown issue';
      return { ok: false, reason: `unexpected ffprobe output structure (${where})` };
    }

    return { ok: true, result: validated.data };
  }
}
