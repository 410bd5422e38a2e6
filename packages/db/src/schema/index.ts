export * from "./documents.js";
export * from "./destinations.js";
export * from "./delivery-attempts.js";
export * from "./settings.js";
export * from "./credentials.js";
