export { renderTemplate, renderSource } from './renderer.js';
export { parseTemplate } from './parser.js';
export type { TemplateNode } from './parser.js';
export { parseCondition, evaluateCondition, testCondition, conditionOptions } from './condition.js';
export type { Condition } from './condition.js';
export {
  applyFilter,
  escapeStringLiteral,
  toPascalCase,
  toCamelCase,
  toSnakeCase,
  FILTER_NAMES,
} from './escape.js';
export type { FilterName } from './escape.js';
