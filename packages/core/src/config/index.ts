export { PanewardConfigSchema, PatternRuleSchema } from './types.js';
export type { PanewardConfig, PanewardConfigInput } from './types.js';
export { parseConfig, loadConfig, classifierOptionsFrom } from './loader.js';
