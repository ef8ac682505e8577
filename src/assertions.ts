/**
 * Precondition helpers. A failed check is a bug at the call site.
 */

import { PreconditionFailure } from './errors'

export function precondition(condition: boolean, why: string): asserts condition {
  if (!condition) throw new PreconditionFailure(why)
}
