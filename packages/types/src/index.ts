export * from "./errors.js";
export * from "./document.js";
export * from "./destination.js";
export * from "./delivery.js";
export * from "./setting.js";
export * from "./credential.js";
export * from "./job.js";
export * from "./config.js";
export * from "./repositories.js";
