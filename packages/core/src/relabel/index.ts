/**
 * Relabel Layer
 */

export { relabel, compileRelabelRegex, expandTemplate } from './relabel.js';
export { parseRelabelRules } from './schema.js';
