export * from "./types.js";
export * from "./logger.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./async.js";
export * from "./rate-limiter.js";
export * from "./retry.js";
export * from "./resilience.js";
export * from "./position.js";
export * from "./channel.js";
export * from "./units.js";
