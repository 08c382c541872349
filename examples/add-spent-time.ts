/**
 * Add Spent Time Example
 *
 * Looks up the work item types of a project and records 90 minutes of the
 * first one on an issue, then prints the issue's total.
 *
 * Usage:
 * ```bash
 * npm run build
 * node dist/examples/add-spent-time.js
 * ```
 */

import { createYouTrackIntegrationFromConfig } from '../src/index.js';

const PROJECT_ID = '0-0'; // Replace with your project ID
const ISSUE_ID = '0-0'; // Replace with your issue ID

async function main(): Promise<void> {
  const youtrack = await createYouTrackIntegrationFromConfig();

  const types = await youtrack.timeTracking.listWorkItemTypes(PROJECT_ID);
  const type = types[0];
  if (type?.id === undefined) {
    throw new Error(`Project ${PROJECT_ID} has no work item types`);
  }
  console.log(`Using work item type: ${type.name ?? type.id}`);

  const workItem = await youtrack.timeTracking.addSpentTime(
    ISSUE_ID,
    90,
    type.id,
    'Worked on feature X'
  );
  console.log(`Added workitem: ${workItem.id}`);

  const total = await youtrack.timeTracking.calculateTimeSpent(ISSUE_ID);
  console.log(`Total time spent: ${total} minutes`);
}

main().catch((error: unknown) => {
  console.error('Error adding spent time:', error instanceof Error ? error.message : error);
  process.exit(1);
});
