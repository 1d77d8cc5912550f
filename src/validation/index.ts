export { validateConfig, assertValidConfig } from './validator';
export { checkBoolean, checkOneOf, checkRange, createIssueCollector } from './helpers';
export type { ConfigIssue, FieldRange, IssueCollector, UncheckedUserConfig, ValidationResult } from './types';
