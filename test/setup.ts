/**
 * Test Setup
 * Global test configuration and utilities
 */

import { vi } from 'vitest';
import pino from 'pino';
import { setLogger } from '../src/core/logger.js';

// Mock nanoid for deterministic-length IDs without touching crypto
vi.mock('nanoid', () => ({
  nanoid: (size?: number) => {
    const chars = 'abcdefghijklmnopqrstuvwxyz0123456789';
    const len = size ?? 21;
    let result = '';
    for (let i = 0; i < len; i++) {
      result += chars[Math.floor(Math.random() * chars.length)];
    }
    return result;
  },
}));

// Keep test output clean; components log through getLogger()
setLogger(pino({ level: 'silent' }));
