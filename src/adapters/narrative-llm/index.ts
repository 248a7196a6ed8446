export {
  NarrativeRequestError,
  OpenAiNarrativeGenerator,
  composeEnhancedMessage,
  extractChoiceContent,
  parseNarrativeContent
} from "./service.js";
export type { OpenAiNarrativeGeneratorOptions } from "./service.js";
