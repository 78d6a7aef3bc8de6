/**
 * Jest setup file
 * This file is run before any tests, setting up mocks and environment
 */

import 'reflect-metadata';

// Mock logger to prevent console output during tests
jest.mock('../src/lib/logger', () => {
  const createMockLogger = () => ({
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    fatal: jest.fn(),
    trace: jest.fn(),
  });

  return {
    logger: createMockLogger(),
    createLogger: jest.fn(() => createMockLogger()),
  };
});

// Set timezone to UTC for consistent date handling in tests
process.env.TZ = 'UTC';

// Configure environment variables for testing
process.env.NODE_ENV = 'test';
process.env.DATABASE_PATH = ':memory:';
process.env.CORPORATION_ID = '98000001';
process.env.ESI_USER_AGENT = 'corp-ledger-tests';
