export * from "./move-request-schema.js";
export * from "./is-move-request.js";
