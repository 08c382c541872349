/**
 * List Issues Example
 *
 * Lists the first page of issues in a project.
 *
 * Prerequisites:
 * - ~/.youtrack.toml with a [youtrack] table holding `token` and `base_url`
 *
 * Usage:
 * ```bash
 * npm run build
 * node dist/examples/list-issues.js
 * ```
 */

import { createYouTrackIntegrationFromConfig } from '../src/index.js';

const PROJECT_ID = '0-0'; // Replace with your project ID

async function main(): Promise<void> {
  const youtrack = await createYouTrackIntegrationFromConfig();

  const issues = await youtrack.issues.list(PROJECT_ID, { limit: 10 });
  for (const issue of issues) {
    console.log(`${issue.id}: ${issue.summary}`);
  }
}

main().catch((error: unknown) => {
  console.error('Error listing issues:', error instanceof Error ? error.message : error);
  process.exit(1);
});
