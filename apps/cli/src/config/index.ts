/**
 * CLI Configuration
 *
 * Defaults for the split pipeline, overridable from the environment or a
 * `.env` file at the repository root (loaded by `./env.js`). Command-line
 * flags win over both.
 */

import { z } from 'zod';
import {
  DEFAULT_MIN_CLIP_DURATION,
  DEFAULT_MIN_SCENE_DURATION,
  DEFAULT_OUTPUT_ROOT,
  DEFAULT_PADDING_SECONDS,
  DEFAULT_SCENE_THRESHOLD,
  ValidationError,
} from '@scenecut/core';

const seconds = z.coerce.number().finite().nonnegative();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Resolved by @scenecut/core; only checked here
  FFMPEG_PATH: z.string().min(1).optional(),
  FFPROBE_PATH: z.string().min(1).optional(),

  SCENECUT_OUTPUT_DIR: z.string().min(1).default(DEFAULT_OUTPUT_ROOT),
  SCENECUT_MIN_SCENE_DURATION: seconds.default(DEFAULT_MIN_SCENE_DURATION),
  SCENECUT_PADDING: seconds.default(DEFAULT_PADDING_SECONDS),
  SCENECUT_MIN_CLIP_DURATION: seconds.default(DEFAULT_MIN_CLIP_DURATION),
  SCENECUT_SCENE_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_SCENE_THRESHOLD),
});

export type LogLevelSetting = NonNullable<z.infer<typeof envSchema>['LOG_LEVEL']>;

export interface Settings {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel?: LogLevelSetting;
  outputDir: string;
  minSceneDuration: number;
  paddingSeconds: number;
  minClipDuration: number;
  sceneThreshold: number;
}

/**
 * Validate an environment. Throws ValidationError listing every bad variable.
 */
export function parseSettings(env: NodeJS.ProcessEnv): Settings {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const problems = parseResult.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ValidationError('environment', problems);
  }

  const parsed = parseResult.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    ...(parsed.LOG_LEVEL !== undefined ? { logLevel: parsed.LOG_LEVEL } : {}),
    outputDir: parsed.SCENECUT_OUTPUT_DIR,
    minSceneDuration: parsed.SCENECUT_MIN_SCENE_DURATION,
    paddingSeconds: parsed.SCENECUT_PADDING,
    minClipDuration: parsed.SCENECUT_MIN_CLIP_DURATION,
    sceneThreshold: parsed.SCENECUT_SCENE_THRESHOLD,
  };
}

/**
 * Validate process.env, after `./env.js` has merged in the `.env` file
 */
export function loadSettings(): Settings {
  return parseSettings(process.env);
}

/**
 * Log level for a CLI run. Without LOG_LEVEL only warnings and errors are
 * logged, so log lines stay out of the spinner; `--debug` overrides both.
 */
export function cliLogLevel(settings: Settings, debug: boolean = false): LogLevelSetting {
  if (debug) return 'debug';
  return settings.logLevel ?? 'warn';
}
