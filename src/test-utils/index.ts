/**
 * Test utilities index
 */

export * from "./helpers";
export * from "./mocks/elastic";
