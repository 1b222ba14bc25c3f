export { defaultRandom, pickOne } from "./random.js";
export { loadResponseLibrary } from "./library.js";
export { COPING_INTROS, QUOTE_PREFIXES, TECHNIQUE_LEAD_IN } from "./framing.js";
export {
  ResponseSelector,
  type ResponseSelectorOptions,
  type SupportReplyOptions,
} from "./selector.js";
