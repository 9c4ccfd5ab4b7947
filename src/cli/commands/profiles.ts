/**
 * Profiles Command Handler
 *
 * Lists the workload profiles generate accepts.
 */

import { listProfiles } from '../../rules/profiles/index.js';
import { createOutput } from '../output.js';

/**
 * Options for the profiles command
 */
export interface ProfilesCommandOptions {
  json?: boolean;
}

/**
 * Execute the profiles command.
 */
export function profilesCommand(options: ProfilesCommandOptions): void {
  const output = createOutput('profiles', options);
  output.profilesTable(listProfiles());
  output.flush();
}
