/**
 * Tests for the command-line program.
 */

import { describe, it, expect } from 'vitest';
import { Command, InvalidArgumentError } from 'commander';
import { createProgram } from '../cli/program.js';
import { GlobalOptions, parseInteger } from '../cli/context.js';
import { createTestIntegration, requestUrl } from '../__mocks__/integration.js';

function createHarness() {
  const { youtrack, mockFetch } = createTestIntegration();
  const out: string[] = [];
  const err: string[] = [];
  const loaded: GlobalOptions[] = [];
  let exitCode = 0;

  const program: Command = createProgram({
    loadIntegration: async (options) => {
      loaded.push(options);
      return youtrack;
    },
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    setExitCode: (code) => {
      exitCode = code;
    },
    colors: false,
  });
  program.exitOverride();
  for (const command of program.commands) {
    command.exitOverride();
  }

  return {
    mockFetch,
    loaded,
    stdout: () => out.join(''),
    stderr: () => err.join(''),
    exitCode: () => exitCode,
    run: (...args: string[]) => program.parseAsync(args, { from: 'user' }),
  };
}

describe('youtrack CLI', () => {
  it('prints one line per issue', async () => {
    const cli = createHarness();
    cli.mockFetch.enqueueJsonResponse(200, [
      { id: '2-1', summary: 'First' },
      { id: '2-2', summary: 'Second' },
    ]);

    await cli.run('list-issues', '--project-id', 'DEMO', '--limit', '2');

    expect(cli.stdout()).toBe('2-1: First\n2-2: Second\n');
    const url = requestUrl(cli.mockFetch);
    expect(url.searchParams.get('query')).toBe('project:DEMO');
    expect(url.searchParams.get('$top')).toBe('2');
    expect(cli.exitCode()).toBe(0);
  });

  it('passes global options to the loader', async () => {
    const cli = createHarness();
    cli.mockFetch.enqueueJsonResponse(200, { id: '1-1', login: 'admin' });

    await cli.run('--config', '/tmp/youtrack-test.toml', '--verbose', 'whoami');

    expect(cli.loaded).toEqual([{ config: '/tmp/youtrack-test.toml', verbose: true }]);
    expect(cli.stdout()).toBe('{\n  "id": "1-1",\n  "login": "admin"\n}\n');
  });

  it('confirms a created issue', async () => {
    const cli = createHarness();
    cli.mockFetch.enqueueJsonResponse(200, { id: '2-15' });

    await cli.run('create-issue', '--project-id', '0-0', '--summary', 'Crash', '--story-points', '3');

    expect(cli.stdout()).toBe('Created issue: 2-15\n');
    expect(cli.mockFetch.getJsonBody()).toEqual({
      project: { id: '0-0' },
      summary: 'Crash',
      description: '',
      customFields: [{ name: 'Story points', value: 3 }],
    });
  });

  it('reports the total time spent', async () => {
    const cli = createHarness();
    cli.mockFetch.enqueueJsonResponse(200, [{ duration: { minutes: 60 } }, { duration: { minutes: 5 } }]);

    await cli.run('calculate-time-spent', '--issue-id', 'DEMO-1');

    expect(cli.stdout()).toBe('Total time spent: 65 minutes\n');
  });

  it('adds spent time with a typed duration', async () => {
    const cli = createHarness();
    cli.mockFetch.enqueueJsonResponse(200, { id: '8-1' });

    await cli.run(
      'add-spent-time',
      '--issue-id',
      'DEMO-1',
      '--duration',
      '30',
      '--workitem-type-id',
      '62-0'
    );

    expect(cli.stdout()).toBe('Added workitem: 8-1\n');
    expect(cli.mockFetch.getJsonBody()).toEqual({
      duration: { minutes: 30 },
      description: '',
      type: { id: '62-0' },
    });
  });

  it('confirms a transition with the issue id it was given', async () => {
    const cli = createHarness();
    cli.mockFetch.enqueueJsonResponse(200, { name: 'State' });

    await cli.run('transition-issue', '--issue-id', 'DEMO-1', '--field-name', 'State', '--new-state', 'Fixed');

    expect(cli.stdout()).toBe('Transitioned issue: DEMO-1\n');
  });

  it('prints null for an empty command response', async () => {
    const cli = createHarness();
    cli.mockFetch.enqueueEmptyResponse(200);

    await cli.run('run-command', '--issue-id', 'DEMO-1', '--command', 'State Fixed', '--comment', 'Done');

    expect(cli.stdout()).toBe('null\n');
    expect(cli.mockFetch.getJsonBody()).toEqual({
      query: 'State Fixed',
      issues: [{ idReadable: 'DEMO-1' }],
      comment: 'Done',
    });
  });

  it('prints API errors and sets the exit code', async () => {
    const cli = createHarness();
    cli.mockFetch.enqueueErrorResponse(404, 'Entity with id DEMO-9 not found');

    await cli.run('get-issue', '--issue-id', 'DEMO-9');

    expect(cli.stdout()).toBe('');
    expect(cli.stderr()).toBe('Error: YouTrack API error: Entity with id DEMO-9 not found\n');
    expect(cli.exitCode()).toBe(1);
  });

  it('refuses a command without its required options', async () => {
    const cli = createHarness();

    await expect(cli.run('add-comment', '--issue-id', 'DEMO-1')).rejects.toMatchObject({
      code: 'commander.missingMandatoryOptionValue',
    });
    expect(cli.stderr()).toBe("error: required option '--text <text>' not specified\n");
    expect(cli.mockFetch.getRequests()).toHaveLength(0);
  });
});

describe('parseInteger', () => {
  it('accepts whole numbers only', () => {
    expect(parseInteger('42')).toBe(42);
    expect(parseInteger(' -3 ')).toBe(-3);
    expect(() => parseInteger('1.5')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('ten')).toThrow('Not an integer.');
  });
});
