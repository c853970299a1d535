/**
 * Vitest Global Setup
 *
 * Silences logging before any module under test creates its logger.
 */

import { initLogger } from '../src/observability/logger.js';

process.env.LOG_LEVEL = 'silent';
initLogger({ level: 'silent' });
