/**
 * Re-exports all typed exception classes.
 *
 * @example
 * ```typescript
 * import { RateNotFoundError } from '../../common/exceptions';
 * ```
 */

export * from './domain.exceptions';
