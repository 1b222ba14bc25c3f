export * from "./types/index.js";
export * from "./config/index.js";
export * from "./emotion/index.js";
export * from "./responses/index.js";
export * from "./services/index.js";
export { buildSupportSystemPrompt } from "./prompts/support.js";
export { readJsonFile } from "./utils/dataFiles.js";
