/**
 * @rpipe/shared - Shared types, schemas, errors and constants
 */

// Export all types
export * from "./types/index.js";

// Export constants
export * from "./constants.js";

// Export error taxonomy
export * from "./errors.js";

// Export wire schemas and codecs
export * from "./wire.js";
export * from "./encoding.js";
