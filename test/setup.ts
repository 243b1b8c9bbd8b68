/**
 * Test Setup
 * Global test configuration and utilities
 */

import pino from 'pino';
import { setLogger } from '../src/core/logger.js';

// Keep test output clean; individual tests inject their own logger when they assert on it
setLogger(pino({ level: 'silent' }));
