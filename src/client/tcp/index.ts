/**
 * TCP framing exports.
 */
export { LineBuffer } from './line-buffer';
