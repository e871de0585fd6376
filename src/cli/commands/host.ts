/**
 * Host Command
 *
 * Emit the full record of the droplet behind one address, or `{}` when no
 * droplet has it.
 */

import { serialize } from '../../cache/serialize'
import { getHostInfo } from '../../inventory/lookup'
import type { PreparedRun } from '../prepare'

export async function cmdHost(host: string, run: PreparedRun): Promise<string> {
  const lookup = await getHostInfo(host, run.context, run.snapshot?.index)
  if (!lookup.found) {
    run.context.logger?.log(`No droplet found for ${host}`)
    return serialize({})
  }
  return serialize(lookup.droplet)
}
