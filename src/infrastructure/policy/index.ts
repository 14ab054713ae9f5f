export { loadRules, createRulePolicy } from './rules-file.js';
