/**
 * Load .env.local (and .env) before any other imports that read env (e.g. @jobfill/llm models).
 * Import this first in scripts: import './load-env.js'
 */
import { config } from 'dotenv';
import path from 'path';

config({ path: path.resolve(process.cwd(), '.env.local') });
config();
