/**
 * @file setup.ts
 * @description Test setup and environment configuration
 */

process.env.NODE_ENV = "test";
process.env.PORT = "8001"; // Use different port for testing

// Placeholder credential; every outbound call is mocked
if (!process.env.MINIMAX_API_KEY) {
  process.env.MINIMAX_API_KEY = "test-minimax-key";
}
