export * from "./session.js";
export * from "./chunk.js";
export * from "./config.js";
export * from "./transport.js";
