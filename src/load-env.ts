/**
 * Loads the .env file that `init` writes (RESEARCH_ENV_PATH or ./.env).
 * Imported first by the entry point so modules that read the environment at
 * import time see it.
 */

import dotenv from 'dotenv';
import { getDefaultEnvPath } from './config.js';

export const envPath = getDefaultEnvPath();

dotenv.config({ path: envPath });
