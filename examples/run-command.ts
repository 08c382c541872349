/**
 * Run Command Example
 *
 * Applies a YouTrack command (here, a state change) to an issue with a comment.
 *
 * Usage:
 * ```bash
 * npm run build
 * node dist/examples/run-command.js
 * ```
 */

import { createYouTrackIntegrationFromConfig } from '../src/index.js';

const ISSUE_ID = '0-0'; // Replace with your issue ID

async function main(): Promise<void> {
  const youtrack = await createYouTrackIntegrationFromConfig();

  const result = await youtrack.queries.runCommand(
    ISSUE_ID,
    'State Fixed',
    'Fixed in commit abc123.'
  );
  console.log('Command result:', result ?? 'applied');
}

main().catch((error: unknown) => {
  console.error('Error running command:', error instanceof Error ? error.message : error);
  process.exit(1);
});
