export { normalizePane, fingerprint } from './fingerprint.js';
export {
  classify,
  detectsInputPrompt,
  DEFAULT_CLASSIFIER_OPTIONS,
} from './classifier.js';
export type { ClassifierOptions } from './classifier.js';
export {
  compileRules,
  trailingRegions,
  matchesAny,
  DEFAULT_PROMPT_PATTERNS,
  DEFAULT_ACTIVITY_PATTERNS,
} from './rules.js';
export type { PatternRule, PatternScope, CompiledRule } from './rules.js';
