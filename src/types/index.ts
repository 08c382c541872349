/**
 * YouTrack REST entity types.
 *
 * YouTrack returns only the attributes named in the `fields` parameter, so every
 * attribute is optional and unknown extra attributes pass through untouched.
 */

import { ValidationError } from '../errors/index.js';

// ============================================================================
// Base Types
// ============================================================================

/**
 * Entity database ID (e.g., "2-15") or readable issue ID (e.g., "DEMO-42").
 */
export type EntityId = string;

/**
 * Common shape of every YouTrack entity; `$type` names the entity class.
 */
export interface YouTrackEntity {
  id?: EntityId;
  $type?: string;
  [key: string]: unknown;
}

// ============================================================================
// Users and Projects
// ============================================================================

export interface YouTrackUser extends YouTrackEntity {
  login?: string;
  name?: string;
  fullName?: string;
  email?: string;
}

export interface YouTrackProject extends YouTrackEntity {
  name?: string;
  shortName?: string;
}

// ============================================================================
// Issues
// ============================================================================

/**
 * Custom field as sent to and returned by the server.
 */
export interface IssueCustomField extends YouTrackEntity {
  name?: string;
  value?: unknown;
}

export interface YouTrackIssue extends YouTrackEntity {
  idReadable?: string;
  summary?: string;
  description?: string;
  project?: YouTrackProject;
  customFields?: IssueCustomField[];
  workItems?: WorkItem[];
}

export interface IssueComment extends YouTrackEntity {
  text?: string;
  author?: YouTrackUser;
  created?: number;
}

export interface IssueAttachment extends YouTrackEntity {
  name?: string;
  size?: number;
  mimeType?: string;
  url?: string;
}

/**
 * Activity (history) record of an issue.
 */
export interface ActivityItem extends YouTrackEntity {
  timestamp?: number;
  author?: YouTrackUser;
  added?: unknown;
  removed?: unknown;
}

/**
 * Activity categories accepted by the activities endpoint.
 */
export type ActivityCategory =
  | 'CommentsCategory'
  | 'AttachmentsCategory'
  | 'CustomFieldCategory'
  | 'DescriptionCategory'
  | 'IssueCreatedCategory'
  | 'IssueResolvedCategory'
  | 'LinksCategory'
  | 'ProjectCategory'
  | 'SprintCategory'
  | 'SummaryCategory'
  | 'TagsCategory'
  | 'WorkItemCategory';

// ============================================================================
// Time Tracking
// ============================================================================

/**
 * Duration as returned by the server; older exports use bare minutes.
 */
export type DurationValue = number | { minutes?: number; presentation?: string; $type?: string };

export interface WorkItemType extends YouTrackEntity {
  name?: string;
  localizedName?: string;
}

export interface WorkItem extends YouTrackEntity {
  duration?: DurationValue;
  author?: YouTrackUser;
  date?: number;
  description?: string;
  type?: WorkItemType;
}

// ============================================================================
// Administration
// ============================================================================

export interface ProjectCustomField extends YouTrackEntity {
  name?: string;
  fieldType?: { id?: string; valueType?: string };
}

export interface Workflow extends YouTrackEntity {
  name?: string;
  description?: string;
}

export interface DeadlineCalendar extends YouTrackEntity {
  name?: string;
  holidays?: unknown[];
}

// ============================================================================
// Agile Boards
// ============================================================================

export interface AgileBoard extends YouTrackEntity {
  name?: string;
  projects?: YouTrackProject[];
}

export interface Sprint extends YouTrackEntity {
  name?: string;
  start?: number | null;
  finish?: number | null;
  isArchived?: boolean;
}

// ============================================================================
// Links
// ============================================================================

export interface IssueLinkType extends YouTrackEntity {
  name?: string;
  directed?: boolean;
}

export type LinkDirection = 'OUTWARD' | 'INWARD' | 'BOTH';

export interface IssueLink extends YouTrackEntity {
  direction?: LinkDirection;
  linkType?: IssueLinkType;
  issues?: YouTrackIssue[];
}

// ============================================================================
// Input Types
// ============================================================================

/**
 * Custom field values keyed by field name. Plain-object values are merged
 * into the field entity (the key stays the field's `name`); anything else
 * becomes its `value`.
 */
export type CustomFieldValues = Record<string, unknown>;

export interface CreateIssueOptions {
  /** Issue description. Default: "" */
  description?: string;
  customFields?: CustomFieldValues;
  /** Value for the "Story points" field */
  storyPoints?: number;
}

export interface UpdateIssueInput {
  summary?: string;
  description?: string;
  customFields?: CustomFieldValues;
  /** Value for the "Story points" field */
  storyPoints?: number;
}

/**
 * Offset pagination as YouTrack's `$skip` / `$top`.
 */
export interface PageOptions {
  /** Max results to return. Default: 20 */
  limit?: number;
  /** Results to skip. Default: 0 */
  skip?: number;
}

export const DEFAULT_PAGE_LIMIT = 20;

/**
 * Name of the custom field written by the `storyPoints` options.
 */
export const STORY_POINTS_FIELD = 'Story points';

// ============================================================================
// Validation and Normalisation
// ============================================================================

/**
 * Returns validation messages for an identifier argument.
 */
export function validateId(name: string, value: string): string[] {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return [`${name} must not be empty`];
  }
  return [];
}

/**
 * Returns validation messages for pagination arguments.
 */
export function validatePage(options: PageOptions): string[] {
  const errors: string[] = [];
  if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit < 0)) {
    errors.push('limit must be a non-negative integer');
  }
  if (options.skip !== undefined && (!Number.isInteger(options.skip) || options.skip < 0)) {
    errors.push('skip must be a non-negative integer');
  }
  return errors;
}

/**
 * Throws a ValidationError carrying every collected message.
 */
export function assertValid(errors: string[]): void {
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Converts `name → value` pairs into the server's custom field list.
 */
export function toCustomFieldList(values: CustomFieldValues): IssueCustomField[] {
  return Object.entries(values).map(([name, value]) =>
    isPlainObject(value) ? { ...value, name } : { name, value }
  );
}

/**
 * Merges the story points shortcut into a custom field map without mutating it.
 */
export function withStoryPoints(
  customFields: CustomFieldValues | undefined,
  storyPoints: number | undefined
): CustomFieldValues {
  const fields: CustomFieldValues = { ...customFields };
  if (storyPoints !== undefined) {
    fields[STORY_POINTS_FIELD] = { value: storyPoints };
  }
  return fields;
}

/**
 * Minutes held by a duration value; missing or malformed durations count as 0.
 */
export function durationMinutes(duration: DurationValue | undefined): number {
  if (typeof duration === 'number') {
    return Number.isFinite(duration) ? duration : 0;
  }
  if (duration && typeof duration.minutes === 'number') {
    return duration.minutes;
  }
  return 0;
}

/**
 * `$skip` / `$top` query parameters for a page request.
 */
export function pageParams(options: PageOptions): { $skip: number; $top: number } {
  return {
    $skip: options.skip ?? 0,
    $top: options.limit ?? DEFAULT_PAGE_LIMIT,
  };
}

/**
 * Encodes an identifier for use as a single path segment.
 */
export function pathSegment(id: string): string {
  return encodeURIComponent(id.trim());
}
