/**
 * rig history — list recorded configuration changes
 *
 * Reads logs/changes.jsonl of the rigging home. Malformed lines are
 * skipped and counted; a partial trailing line (an interrupted write) is
 * skipped and noted.
 */

import { Command, InvalidArgumentError } from 'commander'
import { CHANGE_LOG_FILE, readChangeLog } from '@rigging/runtime-host'
import { applyCommandSettings, CommandFailedError, commandPath } from '../grammar/parse.js'
import { describeChange } from '../output/changes.js'
import { renderTable } from '../output/table.js'
import type { CommandContext } from './component.js'

export const HISTORY_HEADERS: ReadonlyArray<string> = ['Timestamp', 'Interface', 'Changes']

function parseLimit(raw: string): number {
  if (!/^\d+$/.test(raw) || Number(raw) === 0) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return Number(raw)
}

export function historyCommand({ runtime, io, theme }: CommandContext): Command {
  const command = applyCommandSettings(new Command('history'), io)
    .description('List recorded configuration changes, oldest first')
    .option('--interface <name>', 'Only changes made through this interface (e.g. "sensor sink")')
    .option('--limit <n>', 'Show only the most recent n passes', parseLimit)
    .option('--json', 'Print one JSON object per pass')

  command.action((options: { interface?: string; limit?: number; json?: boolean }) => {
    try {
      const { events, stats } = readChangeLog(runtime.stateIO.readLogRaw(CHANGE_LOG_FILE))
      const matching =
        options.interface === undefined ? events : events.filter((e) => e.interface_name === options.interface)
      const shown = options.limit === undefined ? matching : matching.slice(-options.limit)

      if (stats.parseErrors > 0) {
        io.err(theme.amber(`[rig history] skipped ${stats.parseErrors} malformed line(s)`))
      }
      if (stats.partialTrailingLine) {
        io.err(theme.amber('[rig history] skipped an incomplete final line'))
      }

      if (options.json === true) {
        for (const event of shown) io.out(JSON.stringify(event))
        return
      }
      if (shown.length === 0) {
        io.out(theme.muted('No changes recorded.'))
        return
      }
      io.out(
        renderTable(
          {
            headers: HISTORY_HEADERS,
            rows: shown.map((event) => [
              event.timestamp,
              event.interface_name,
              event.changes.map(describeChange).join('; '),
            ]),
          },
          theme,
        ),
      )
    } catch (error) {
      throw new CommandFailedError(commandPath(command), error)
    }
  })
  return command
}
