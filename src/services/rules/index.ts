/**
 * Rules Module
 *
 * @module services/rules
 */

export { evaluate } from './engine.js';
export { validateRow } from './validator.js';
