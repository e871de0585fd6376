/**
 * List Command
 *
 * Emit the whole inventory. A run that refreshed serializes what it built;
 * otherwise the cache artifact is returned verbatim.
 */

import { serialize } from '../../cache/serialize'
import type { PreparedRun } from '../prepare'

export function cmdList(run: PreparedRun): string {
  if (run.snapshot) {
    return serialize(run.snapshot.inventory)
  }
  return run.context.cache.readInventoryText()
}
