/**
 * Administration service implementation: projects, users, custom fields,
 * workflows, calendars and reports.
 */

import { YouTrackClient } from '../client/index.js';
import {
  DeadlineCalendar,
  PageOptions,
  ProjectCustomField,
  Workflow,
  YouTrackEntity,
  YouTrackProject,
  YouTrackUser,
  assertValid,
  pageParams,
  pathSegment,
  validateId,
  validatePage,
} from '../types/index.js';

export const PROJECT_FIELDS = 'id,name,shortName';
export const USER_FIELDS = 'id,login,name,email';
export const CURRENT_USER_FIELDS = 'id,login,name';
export const CUSTOM_FIELD_FIELDS = 'id,name,fieldType(id,valueType)';
export const WORKFLOW_FIELDS = 'id,name,description';
export const CALENDAR_FIELDS = 'id,name,holidays';

// ============================================================================
// Admin Service Interface
// ============================================================================

export interface ListUsersOptions extends PageOptions {
  /** Filter by login, name or email */
  query?: string;
}

/**
 * Admin service interface.
 */
export interface AdminService {
  listProjects(): Promise<YouTrackProject[]>;
  listUsers(options?: ListUsersOptions): Promise<YouTrackUser[]>;
  listCustomFields(projectId: string): Promise<ProjectCustomField[]>;
  listWorkflows(): Promise<Workflow[]>;
  getDeadlineCalendars(): Promise<DeadlineCalendar[]>;
  /** Execute a saved report */
  runReport(reportId: string): Promise<YouTrackEntity | undefined>;
  /** Fetch the token owner; fails with AuthenticationError on a bad token */
  authenticate(): Promise<YouTrackUser>;
}

// ============================================================================
// Admin Service Implementation
// ============================================================================

export class AdminServiceImpl implements AdminService {
  private readonly client: YouTrackClient;

  constructor(client: YouTrackClient) {
    this.client = client;
  }

  async listProjects(): Promise<YouTrackProject[]> {
    return this.client.tracer.withSpan(
      'youtrack.admin.projects',
      async () => this.client.get<YouTrackProject[]>('/admin/projects', { fields: PROJECT_FIELDS }),
      { operation: 'listProjects' }
    );
  }

  async listUsers(options: ListUsersOptions = {}): Promise<YouTrackUser[]> {
    return this.client.tracer.withSpan(
      'youtrack.admin.users',
      async () => {
        assertValid(validatePage(options));

        return this.client.get<YouTrackUser[]>('/users', {
          fields: USER_FIELDS,
          query: options.query || undefined,
          ...pageParams(options),
        });
      },
      { operation: 'listUsers' }
    );
  }

  async listCustomFields(projectId: string): Promise<ProjectCustomField[]> {
    return this.client.tracer.withSpan(
      'youtrack.admin.custom_fields',
      async (span) => {
        span.setAttribute('project', projectId);
        assertValid(validateId('projectId', projectId));

        return this.client.get<ProjectCustomField[]>(
          `/admin/projects/${pathSegment(projectId)}/customfields`,
          { fields: CUSTOM_FIELD_FIELDS }
        );
      },
      { operation: 'listCustomFields' }
    );
  }

  async listWorkflows(): Promise<Workflow[]> {
    return this.client.tracer.withSpan(
      'youtrack.admin.workflows',
      async () => this.client.get<Workflow[]>('/workflows', { fields: WORKFLOW_FIELDS }),
      { operation: 'listWorkflows' }
    );
  }

  async getDeadlineCalendars(): Promise<DeadlineCalendar[]> {
    return this.client.tracer.withSpan(
      'youtrack.admin.calendars',
      async () =>
        this.client.get<DeadlineCalendar[]>('/admin/calendars', { fields: CALENDAR_FIELDS }),
      { operation: 'getDeadlineCalendars' }
    );
  }

  async runReport(reportId: string): Promise<YouTrackEntity | undefined> {
    return this.client.tracer.withSpan(
      'youtrack.admin.report',
      async (span) => {
        span.setAttribute('report', reportId);
        assertValid(validateId('reportId', reportId));

        const result = await this.client.send<YouTrackEntity>(
          `/reports/${pathSegment(reportId)}/execute`
        );

        this.client.logger.info('Report executed', { report: reportId });
        return result;
      },
      { operation: 'runReport' }
    );
  }

  async authenticate(): Promise<YouTrackUser> {
    return this.client.tracer.withSpan(
      'youtrack.admin.authenticate',
      async () => {
        const user = await this.client.get<YouTrackUser>('/users/me', {
          fields: CURRENT_USER_FIELDS,
        });

        this.client.logger.debug('Authenticated', { login: user.login });
        return user;
      },
      { operation: 'authenticate' }
    );
  }
}

/**
 * Creates an admin service instance.
 */
export function createAdminService(client: YouTrackClient): AdminService {
  return new AdminServiceImpl(client);
}
