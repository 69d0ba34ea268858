export type { LogFormatter } from './types.js';
export { JsonFormatter } from './json.js';
export { LineFormatter } from './line.js';
