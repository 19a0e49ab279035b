/**
 * Jest Test Setup
 *
 * Configures the test environment before running tests.
 */

import "reflect-metadata";

jest.setTimeout(30000);

process.env.NODE_ENV = "test";

// Suppress console logs during tests (optional)
// global.console = {
//   ...console,
//   log: jest.fn(),
//   debug: jest.fn(),
// };
