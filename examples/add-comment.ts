/**
 * Add Comment Example
 *
 * Usage:
 * ```bash
 * npm run build
 * node dist/examples/add-comment.js
 * ```
 */

import { createYouTrackIntegrationFromConfig } from '../src/index.js';

const ISSUE_ID = '0-0'; // Replace with your issue ID

async function main(): Promise<void> {
  const youtrack = await createYouTrackIntegrationFromConfig();

  const comment = await youtrack.comments.add(ISSUE_ID, 'This is a test comment.');
  console.log(`Added comment: ${comment.id}`);
}

main().catch((error: unknown) => {
  console.error('Error adding comment:', error instanceof Error ? error.message : error);
  process.exit(1);
});
