/**
 * @scenecut/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Time and size formatting
 * - Type guards
 * - Logger
 */

// Command execution
export {
  executeCommand,
  tailOutput,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  getFileSizeBytes,
  isRegularFile,
  removeFileIfExists,
} from './file.js';

// Path utilities
export {
  VIDEO_EXTENSIONS,
  sanitizeFilename,
  getExtension,
  getBasename,
  isVideoFile,
} from './path.js';

// Type guards
export { isNumber, isFiniteNonNegative } from './guards.js';

// Time and size formatting
export {
  formatDuration,
  formatSeconds,
  toFFmpegTime,
  formatBytes,
} from './time.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
