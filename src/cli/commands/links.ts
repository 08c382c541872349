/**
 * Issue link commands.
 */

import { Command } from 'commander';
import { ActionRunner } from '../context.js';
import { json } from '../format.js';

export function registerLinkCommands(program: Command, run: ActionRunner): void {
  program
    .command('get-issue-links')
    .description('List links of an issue')
    .requiredOption('--issue-id <id>', 'Issue ID')
    .action(
      run<{ issueId: string }>(async (youtrack, options) =>
        json(await youtrack.links.getIssueLinks(options.issueId))
      )
    );

  program
    .command('list-issue-link-types')
    .description('List all issue link types')
    .action(run(async (youtrack) => json(await youtrack.links.listLinkTypes())));

  program
    .command('list-issue-link-types-for-issue')
    .description('List link types available for an issue')
    .requiredOption('--issue-id <id>', 'Issue ID')
    .action(
      run<{ issueId: string }>(async (youtrack, options) =>
        json(await youtrack.links.listLinkTypesForIssue(options.issueId))
      )
    );

  program
    .command('list-issue-link-types-for-project')
    .description('List link types available in a project')
    .requiredOption('--project-id <id>', 'Project ID')
    .action(
      run<{ projectId: string }>(async (youtrack, options) =>
        json(await youtrack.links.listLinkTypesForProject(options.projectId))
      )
    );

  program
    .command('add-issue-link')
    .description('Link two issues')
    .requiredOption('--source-issue-id <id>', 'Source issue ID')
    .requiredOption('--target-issue-id <id>', 'Target issue ID')
    .requiredOption('--link-type-id <id>', 'Link type ID')
    .action(
      run<{ sourceIssueId: string; targetIssueId: string; linkTypeId: string }>(
        async (youtrack, options) =>
          json(
            await youtrack.links.addLink(
              options.sourceIssueId,
              options.targetIssueId,
              options.linkTypeId
            )
          )
      )
    );
}
