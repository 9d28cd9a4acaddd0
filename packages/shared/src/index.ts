export * from "./types/api.js";
export * from "./types/chat.js";
export * from "./types/document.js";
export * from "./types/metrics.js";
export * from "./types/query.js";
export * from "./store.js";
