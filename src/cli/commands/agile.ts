/**
 * Agile board commands.
 */

import { Command } from 'commander';
import { ActionRunner } from '../context.js';
import { json } from '../format.js';

export function registerAgileCommands(program: Command, run: ActionRunner): void {
  program
    .command('list-boards')
    .description('List agile boards')
    .option('--project-id <id>', 'Only boards attached to this project')
    .action(
      run<{ projectId?: string }>(async (youtrack, options) =>
        json(await youtrack.agile.listBoards(options.projectId))
      )
    );

  program
    .command('list-sprints')
    .description('List sprints of a board')
    .requiredOption('--board-id <id>', 'Board ID')
    .action(
      run<{ boardId: string }>(async (youtrack, options) =>
        json(await youtrack.agile.listSprints(options.boardId))
      )
    );

  program
    .command('list-user-stories')
    .description('List issues on a board, optionally within one sprint')
    .requiredOption('--board-id <id>', 'Board ID')
    .option('--sprint-id <id>', 'Sprint ID')
    .action(
      run<{ boardId: string; sprintId?: string }>(async (youtrack, options) =>
        json(await youtrack.agile.listUserStories(options.boardId, options.sprintId))
      )
    );

  program
    .command('add-issue-to-sprint')
    .description('Add an issue to a sprint')
    .requiredOption('--board-id <id>', 'Board ID')
    .requiredOption('--sprint-id <id>', 'Sprint ID')
    .requiredOption('--issue-id <id>', 'Issue ID')
    .action(
      run<{ boardId: string; sprintId: string; issueId: string }>(async (youtrack, options) =>
        json(
          await youtrack.agile.addIssueToSprint(options.boardId, options.sprintId, options.issueId)
        )
      )
    );

  program
    .command('add-issue-to-user-story')
    .description('Make an issue a subtask of a user story')
    .requiredOption('--board-id <id>', 'Board ID')
    .requiredOption('--user-story-id <id>', 'User story (epic) ID')
    .requiredOption('--issue-id <id>', 'Issue ID')
    .action(
      run<{ boardId: string; userStoryId: string; issueId: string }>(async (youtrack, options) =>
        json(
          await youtrack.agile.addIssueToUserStory(
            options.boardId,
            options.userStoryId,
            options.issueId
          )
        )
      )
    );

  program
    .command('add-user-story-to-sprint')
    .description('Add a user story to a sprint')
    .requiredOption('--board-id <id>', 'Board ID')
    .requiredOption('--sprint-id <id>', 'Sprint ID')
    .requiredOption('--user-story-id <id>', 'User story (epic) ID')
    .action(
      run<{ boardId: string; sprintId: string; userStoryId: string }>(async (youtrack, options) =>
        json(
          await youtrack.agile.addUserStoryToSprint(
            options.boardId,
            options.sprintId,
            options.userStoryId
          )
        )
      )
    );
}
