/**
 * @scenecut/core
 * 
 * Core package containing:
 * - Error taxonomy
 * - Pipeline defaults
 * - External binary resolution
 */

// Errors
export {
  SceneCutError,
  ValidationError,
  ProbeError,
  DetectionInsufficientError,
  CommandExecutionError,
  SessionBusyError,
  errorMessage,
} from './errors/index.js';

// Defaults
export {
  TIME_EPSILON,
  DEFAULT_PADDING_SECONDS,
  DEFAULT_MIN_CLIP_DURATION,
  DEFAULT_MIN_SCENE_DURATION,
  DEFAULT_SCENE_THRESHOLD,
  SAMPLE_INTERVAL_SECONDS,
  DEFAULT_OUTPUT_ROOT,
  DEFAULT_CLIP_PREFIX,
  DEFAULT_CLIP_EXTENSION,
  TIMEOUTS,
} from './config/defaults.js';

// Binaries
export {
  resolveBinaryPath,
  getOsFolder,
  getBinariesConfig,
  binaries,
  getBinaryPath,
  isBinaryAvailable,
  getBinaryVersion,
  getBinaryFolders,
  type BinaryName,
  type BinarySource,
  type BinaryConfig,
  type BinariesConfig,
} from './config/binaries.js';
