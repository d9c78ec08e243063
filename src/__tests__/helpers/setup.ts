/**
 * Jest Test Setup
 * Global test configuration and setup
 */

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.STORE_PATH = process.env.STORE_PATH || '/tmp/egress-rotator-test';
process.env.PROXY_DIRECTIVE_FILE = process.env.PROXY_DIRECTIVE_FILE || '/tmp/egress-rotator-test/.curlrc';

// Rotation and probe output is noisy; set DEBUG_TESTS to see it
if (!process.env.DEBUG_TESTS) {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
}
