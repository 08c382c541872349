/**
 * Output formatting for CLI commands.
 */

import { ChalkInstance } from 'chalk';
import { YouTrackIssue } from '../types/index.js';

/**
 * One `<id>: <summary>` line per issue.
 */
export function issueLines(issues: YouTrackIssue[]): string[] {
  return issues.map((issue) => `${issue.id ?? ''}: ${issue.summary ?? ''}`);
}

/**
 * Pretty JSON; an empty response prints as `null`.
 */
export function json(value: unknown): string {
  return JSON.stringify(value ?? null, null, 2);
}

/**
 * `<Label>: <id>` confirmation line.
 */
export function confirmation(style: ChalkInstance, label: string, id: string | undefined): string {
  return `${style.green(`${label}:`)} ${id ?? ''}`;
}
