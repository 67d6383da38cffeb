/**
 * Binary Configuration
 * 
 * Resolves the ffmpeg and ffprobe executables with automatic OS detection.
 * 
 * Priority order:
 * 1. Environment variables (FFMPEG_PATH, FFPROBE_PATH)
 * 2. Bundled binary folder (bin/<os>/ at the repository root)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { executeCommand, type CommandRunner } from '@scenecut/utils';
import { TIMEOUTS } from './defaults.js';
import { CommandExecutionError } from '../errors/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// packages/core/src/config -> repository root
const BINARY_ROOT = resolve(__dirname, '../../../../bin');

/**
 * OS-specific subfolder
 */
export function getOsFolder(): string {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

/**
 * Get executable extension for current OS
 */
function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

export type BinaryName = 'ffmpeg' | 'ffprobe';

export type BinarySource = 'env' | 'bundled' | 'path';

export interface BinaryConfig {
  name: BinaryName;
  envVar: string;
  resolvedPath: string;
  source: BinarySource;
}

export type BinariesConfig = Record<BinaryName, BinaryConfig>;

const ENV_VARS: Record<BinaryName, string> = {
  ffmpeg: 'FFMPEG_PATH',
  ffprobe: 'FFPROBE_PATH',
};

/**
 * Resolve a binary path with priority env → bundled → PATH
 */
export function resolveBinaryPath(
  name: BinaryName,
  env: NodeJS.ProcessEnv = process.env,
  binaryRoot: string = BINARY_ROOT
): BinaryConfig {
  const envVar = ENV_VARS[name];

  // 1. Environment variable
  const envPath = env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  // 2. Bundled binary folder
  const bundledPath = join(binaryRoot, getOsFolder(), name + getExeExt());
  if (existsSync(bundledPath)) {
    return { name, envVar, resolvedPath: bundledPath, source: 'bundled' };
  }

  // 3. Bare name, resolved by the OS at spawn time
  return { name, envVar, resolvedPath: name, source: 'path' };
}

/**
 * Get all binary configurations
 */
export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', env),
    ffprobe: resolveBinaryPath('ffprobe', env),
  };
}

// Singleton instance
let _binaries: BinariesConfig | null = null;

/**
 * Get binary configurations (cached)
 */
export function binaries(): BinariesConfig {
  if (!_binaries) {
    _binaries = getBinariesConfig();
  }
  return _binaries;
}

/**
 * Get a specific binary path
 */
export function getBinaryPath(name: BinaryName): string {
  return binaries()[name].resolvedPath;
}

/**
 * Check if a binary runs. Both ffmpeg and ffprobe accept `-version`.
 */
export async function isBinaryAvailable(
  binaryPath: string,
  runner: CommandRunner = executeCommand
): Promise<boolean> {
  try {
    const result = await runner(binaryPath, ['-version'], {
      timeout: TIMEOUTS.versionCheckMs,
    });
    return result.exitCode === 0;
  } catch {
    // spawn failure means the binary is not resolvable
    return false;
  }
}

/**
 * First line of `-version` output, e.g. "ffmpeg version 6.1.1 Copyright ...".
 * Rejects with CommandExecutionError when the binary exits non-zero.
 */
export async function getBinaryVersion(
  binaryPath: string,
  runner: CommandRunner = executeCommand
): Promise<string> {
  const result = await runner(binaryPath, ['-version'], {
    timeout: TIMEOUTS.versionCheckMs,
  });
  if (result.exitCode !== 0) {
    throw new CommandExecutionError(`${binaryPath} -version`, result.exitCode, result.stderr);
  }
  return result.stdout.split('\n')[0]?.trim() ?? '';
}

/**
 * Get binary folder paths for user reference
 */
export function getBinaryFolders(): { root: string; os: string } {
  return {
    root: BINARY_ROOT,
    os: join(BINARY_ROOT, getOsFolder()),
  };
}
