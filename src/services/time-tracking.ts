/**
 * Time tracking service implementation.
 *
 * Reads and records spent time (work items) on issues.
 */

import { YouTrackClient } from '../client/index.js';
import { MetricNames } from '../observability/index.js';
import {
  PageOptions,
  WorkItem,
  WorkItemType,
  YouTrackIssue,
  assertValid,
  durationMinutes,
  pageParams,
  pathSegment,
  validateId,
  validatePage,
} from '../types/index.js';

export const ISSUE_WORK_ITEM_FIELDS = 'id,summary,workItems(id,duration,author,date,description)';
export const WORK_ITEM_FIELDS = 'id,duration,description,type(id,name)';
export const WORK_ITEM_TYPE_FIELDS = 'id,name,localizedName';

// ============================================================================
// Time Tracking Service Interface
// ============================================================================

/**
 * Time tracking service interface.
 */
export interface TimeTrackingService {
  /** List the issues of a project with their work items */
  listWorkItems(projectId: string, options?: PageOptions): Promise<YouTrackIssue[]>;
  /** Total minutes recorded on an issue */
  calculateTimeSpent(issueId: string): Promise<number>;
  /** Work item types enabled for a project */
  listWorkItemTypes(projectId: string): Promise<WorkItemType[]>;
  /** Record spent time on an issue */
  addSpentTime(
    issueId: string,
    durationMinutes: number,
    workItemTypeId: string,
    description?: string
  ): Promise<WorkItem>;
}

// ============================================================================
// Time Tracking Service Implementation
// ============================================================================

export class TimeTrackingServiceImpl implements TimeTrackingService {
  private readonly client: YouTrackClient;

  constructor(client: YouTrackClient) {
    this.client = client;
  }

  async listWorkItems(projectId: string, options: PageOptions = {}): Promise<YouTrackIssue[]> {
    return this.client.tracer.withSpan(
      'youtrack.time.list',
      async (span) => {
        span.setAttribute('project', projectId);
        assertValid([...validateId('projectId', projectId), ...validatePage(options)]);

        return this.client.get<YouTrackIssue[]>('/issues', {
          fields: ISSUE_WORK_ITEM_FIELDS,
          query: `project:${projectId.trim()}`,
          ...pageParams(options),
        });
      },
      { operation: 'listWorkItems' }
    );
  }

  async calculateTimeSpent(issueId: string): Promise<number> {
    return this.client.tracer.withSpan(
      'youtrack.time.total',
      async (span) => {
        span.setAttribute('issue', issueId);
        assertValid(validateId('issueId', issueId));

        const workItems = await this.client.get<WorkItem[]>(
          `/issues/${pathSegment(issueId)}/timeTracking/workItems`,
          { fields: 'duration(minutes)' }
        );

        return workItems.reduce((total, item) => total + durationMinutes(item.duration), 0);
      },
      { operation: 'calculateTimeSpent' }
    );
  }

  async listWorkItemTypes(projectId: string): Promise<WorkItemType[]> {
    return this.client.tracer.withSpan(
      'youtrack.time.types',
      async (span) => {
        span.setAttribute('project', projectId);
        assertValid(validateId('projectId', projectId));

        return this.client.get<WorkItemType[]>(
          `/admin/projects/${pathSegment(projectId)}/timetrackingsettings/workitemtypes`,
          { fields: WORK_ITEM_TYPE_FIELDS }
        );
      },
      { operation: 'listWorkItemTypes' }
    );
  }

  async addSpentTime(
    issueId: string,
    minutes: number,
    workItemTypeId: string,
    description: string = ''
  ): Promise<WorkItem> {
    return this.client.tracer.withSpan(
      'youtrack.time.add',
      async (span) => {
        span.setAttribute('issue', issueId);
        span.setAttribute('minutes', minutes);

        assertValid([
          ...validateId('issueId', issueId),
          ...validateId('workItemTypeId', workItemTypeId),
          ...(Number.isInteger(minutes) && minutes > 0
            ? []
            : ['duration must be a positive number of minutes']),
        ]);

        const workItem = await this.client.post<WorkItem>(
          `/issues/${pathSegment(issueId)}/timeTracking/workItems`,
          {
            duration: { minutes },
            description,
            type: { id: workItemTypeId.trim() },
          },
          { fields: WORK_ITEM_FIELDS }
        );

        this.client.logger.info('Work item added', {
          issue: issueId,
          workItemId: workItem.id,
          minutes,
        });
        this.client.metrics.increment(MetricNames.WORK_ITEMS_ADDED);

        return workItem;
      },
      { operation: 'addSpentTime' }
    );
  }
}

/**
 * Creates a time tracking service instance.
 */
export function createTimeTrackingService(client: YouTrackClient): TimeTrackingService {
  return new TimeTrackingServiceImpl(client);
}
