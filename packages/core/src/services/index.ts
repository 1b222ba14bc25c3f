export { fetchOnce, type FetchOnceOptions } from "./http.js";
export { createQuoteClient, type QuoteClientOptions } from "./quoteClient.js";
export { probeServerStatus, type StatusProbeOptions } from "./statusProbe.js";
export {
  createSupportGenerator,
  extractTextFromResponse,
  getLlmCircuitMetrics,
  resetLlmCircuit,
  type SupportGeneratorOptions,
} from "./supportGenerator.js";
