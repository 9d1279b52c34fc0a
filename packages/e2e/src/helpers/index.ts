/**
 * E2E Test Helpers
 *
 * Barrel export for all test helper modules.
 */

export * from "./constants.js";
export * from "./mock-endpoint.js";
export * from "./test-fixture.js";
