/**
 * Layout module barrel exports
 */

export { LayoutParser } from './layout-parser.js';
