/**
 * Imported first by every script so `.env` values are in place before any
 * module reads the environment.
 */

import { loadDotenvFiles } from '../src/core/env';

loadDotenvFiles();
