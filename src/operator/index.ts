export { Operator } from './operator.js';
export type { OperatorOptions, OperatorState } from './operator.js';
