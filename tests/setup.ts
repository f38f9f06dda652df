/**
 * Test setup file
 *
 * Keeps component loggers quiet unless a test reconfigures them.
 */

import { configureLogger } from '../src/utils/logger.js';

configureLogger({ level: 'silent' });
