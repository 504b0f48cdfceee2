/**
 * @restwire/core-util
 *
 * Lowest-level utilities shared by every restwire package.
 *
 * @packageDocumentation
 */

export { toError } from './lib/errorUtils';
