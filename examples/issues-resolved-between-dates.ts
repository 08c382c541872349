/**
 * Issues Resolved Between Dates Example
 *
 * Lists every issue of a project whose 'Release Status' field is Resolved and
 * that was resolved within a date range, following all result pages.
 *
 * Usage:
 * ```bash
 * npm run build
 * node dist/examples/issues-resolved-between-dates.js
 * ```
 */

import { createYouTrackIntegrationFromConfig } from '../src/index.js';

const PROJECT_ID = '0-0'; // Replace with your project ID
const START_DATE = '2025-07-01'; // YYYY-MM-DD
const END_DATE = '2025-07-08'; // YYYY-MM-DD

async function main(): Promise<void> {
  const youtrack = await createYouTrackIntegrationFromConfig();

  const query = `project:${PROJECT_ID} 'Release Status':Resolved Resolved: ${START_DATE} .. ${END_DATE}`;
  const issues = await youtrack.issues.searchAll(query, { pageSize: 50 });

  for (const issue of issues) {
    console.log(`${issue.id}: ${issue.summary}`);
  }
  console.log(`\n${issues.length} issue(s) resolved between ${START_DATE} and ${END_DATE}`);
}

main().catch((error: unknown) => {
  console.error('Error searching issues:', error instanceof Error ? error.message : error);
  process.exit(1);
});
