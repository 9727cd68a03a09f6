/**
 * commands/index.ts: Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/aclforge.ts and by the command tests.
 */

import { program } from 'commander'
import { renderCommand } from './render.js'

program
  .name('aclforge')
  .description(
    'aclforge: render vendor-neutral network filter policies as Cisco IOS access lists.\n' +
    'Policies are read as JSON with every symbolic name already resolved.',
  )
  .version('0.1.0')

program.addCommand(renderCommand)

export { program }
