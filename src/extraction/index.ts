export {
  ExtractionPipeline,
  extractProductData,
  extractFromDocument,
  emptyProductData,
  parseMarkup,
  rulesFor,
} from "./pipeline.js";
export {
  RuleSetStore,
  compileRuleSet,
  loadRuleSet,
  DEFAULT_RULES_PATH,
  RULE_FIELDS,
  type ExtractionRuleSet,
  type FieldRule,
  type FieldRules,
  type HostRules,
  type PricePattern,
  type RuleField,
  type RuleSetDocument,
} from "./rules.js";
export { parsePrice } from "./price.js";
export { parseSpecifications } from "./specifications.js";
export { extractMetaTags, extractMetaContent } from "./metadata.js";
