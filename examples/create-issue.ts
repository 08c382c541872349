/**
 * Create Issue Example
 *
 * Creates an issue with a description and a story points estimate.
 *
 * Prerequisites:
 * - ~/.youtrack.toml with a [youtrack] table holding `token` and `base_url`
 *
 * Usage:
 * ```bash
 * npm run build
 * node dist/examples/create-issue.js
 * ```
 */

import { createYouTrackIntegrationFromConfig } from '../src/index.js';

const PROJECT_ID = '0-0'; // Replace with your project ID

async function main(): Promise<void> {
  const youtrack = await createYouTrackIntegrationFromConfig();

  const issue = await youtrack.issues.create(PROJECT_ID, 'Example issue from the client', {
    description: 'Created by the create-issue example.',
    storyPoints: 3,
  });

  console.log(`Created issue: ${issue.id}`);
}

main().catch((error: unknown) => {
  console.error('Error creating issue:', error instanceof Error ? error.message : error);
  process.exit(1);
});
