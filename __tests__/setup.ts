/**
 * Jest setup file
 * This file is executed before each test file
 */

// Set test environment variables BEFORE imports
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error'; // Reduce logging noise during tests

// Global test timeout
jest.setTimeout(30000);
