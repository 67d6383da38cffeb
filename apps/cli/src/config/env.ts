/**
 * Loads `.env` from the repository root into process.env.
 *
 * Imported first by the entry point: the shared logger reads NODE_ENV and
 * LOG_LEVEL when its module is evaluated. Nothing from the workspace
 * packages may be imported here.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const ENV_FILE = resolve(__dirname, '../../../..', '.env');

dotenvConfig({ path: ENV_FILE });
