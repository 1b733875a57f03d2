/**
 * Jest Test Setup
 * Sets up environment variables and mocks for testing
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';

// Mock logger to suppress logs during tests
jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  },
}));

// Clean up mocks after each test
// resetAllMocks() clears mock history AND resets implementations
afterEach(() => {
  jest.resetAllMocks();
});
