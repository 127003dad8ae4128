import { TARGET_NAMES } from '../targets.js';

export const SCRIPT_NAME = 'status-bar';

export function usageText(monitorIds: readonly string[]): string {
    return `Usage: ${SCRIPT_NAME} run TARGET
   or: ${SCRIPT_NAME} run TARGET MONITOR ...
       Can be used during development to only start specific monitors,
       whatever the value of their \`enabled\` property.
   or: ${SCRIPT_NAME} log TARGET [COMMAND ...]
       View the log file using less (or the specified command).
   or: ${SCRIPT_NAME} trigger MONITOR ...
       If the monitor has a \`compute\` function, requests an immediate update.

Targets:  ${TARGET_NAMES.join(' ')}
Monitors: ${monitorIds.join(' ')}`;
}
