import {
  SmokeTestRunner,
  extractFirstProjectId,
  extractTaskResources
} from '../../../services/smoke/smoke-test-runner';
import { ApiClient } from '../../../services/api/api-client';
import { ConsoleLogger } from '../../../core/logger';
import { createRecordingOutput, jsonResponse, requestHeaders, requestedUrls, stubFetch } from '../../helpers';

const API_URL = 'http://api.test';

describe('SmokeTestRunner', () => {
  const logger = new ConsoleLogger('ERROR');

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function createRunner() {
    const output = createRecordingOutput();
    const runner = new SmokeTestRunner(new ApiClient(API_URL, logger, 'test-token'), logger, output);
    return { runner, output };
  }

  it('should skip storage and task steps when there are no projects', async () => {
    const fetchSpy = stubFetch((url) => {
      if (url === `${API_URL}/health`) return jsonResponse({ status: 'ok' });
      if (url === `${API_URL}/me`) return jsonResponse({ id: 'user-1' });
      return jsonResponse({ projects: [] });
    });
    const { runner, output } = createRunner();

    const report = await runner.run();

    expect(requestedUrls(fetchSpy)).toEqual([`${API_URL}/health`, `${API_URL}/me`, `${API_URL}/projects`]);
    expect(report.projectId).toBeNull();
    expect(report.steps.map((step) => [step.name, step.outcome])).toEqual([
      ['health', 'passed'],
      ['user-info', 'passed'],
      ['projects-list', 'passed'],
      ['storage-list', 'skipped'],
      ['presigned-url', 'skipped'],
      ['tasks-list', 'skipped'],
      ['task-resources', 'skipped']
    ]);
    expect(output.lines()).toContain('⚠️  No projects found. Create a project first to test storage endpoints.');
    expect(output.lines()).toContain('=== API Testing Complete ===');
  });

  it('should run every step against the first project', async () => {
    const fetchSpy = stubFetch((url) => {
      switch (url) {
        case `${API_URL}/health`:
          return jsonResponse({ status: 'ok' });
        case `${API_URL}/me`:
          return jsonResponse({ id: 'user-1' });
        case `${API_URL}/projects`:
          return jsonResponse({ projects: [{ id: 'p1', name: 'First' }, { id: 'p2', name: 'Second' }] });
        case `${API_URL}/projects/p1/storage`:
          return jsonResponse({ objects: [] });
        case `${API_URL}/projects/p1/storage/test.jpg/url`:
          return jsonResponse({ error: 'Object not found' }, 404);
        case `${API_URL}/projects/p1/tasks`:
          return jsonResponse({
            tasks: [
              { name: 'cat', resource_url: 's3://bucket/cat.jpg', resolved_resource_url: 'https://files.test/cat.jpg' },
              { name: 'empty', resource_url: null },
              { name: 'literal-null', resource_url: 'null' },
              { name: 'dog', resource_url: 's3://bucket/dog.jpg', resolved_resource_url: null }
            ]
          });
        case 'https://files.test/cat.jpg':
          return new Response('image-bytes', { status: 200 });
        default:
          return jsonResponse({ error: 'unexpected' }, 500);
      }
    });
    const { runner, output } = createRunner();

    const report = await runner.run();

    expect(requestedUrls(fetchSpy)).toEqual([
      `${API_URL}/health`,
      `${API_URL}/me`,
      `${API_URL}/projects`,
      `${API_URL}/projects/p1/storage`,
      `${API_URL}/projects/p1/storage/test.jpg/url`,
      `${API_URL}/projects/p1/tasks`,
      'https://files.test/cat.jpg'
    ]);
    expect(requestHeaders(fetchSpy, 0)).not.toHaveProperty('authorization');
    expect(requestHeaders(fetchSpy, 4)).toHaveProperty('x-expires-in', '3600');
    expect(requestHeaders(fetchSpy, 6)).not.toHaveProperty('authorization');

    expect(report.projectId).toBe('p1');
    expect(report.steps.map((step) => [step.name, step.outcome])).toEqual([
      ['health', 'passed'],
      ['user-info', 'passed'],
      ['projects-list', 'passed'],
      ['storage-list', 'passed'],
      ['presigned-url', 'passed'],
      ['tasks-list', 'passed'],
      ['task-resources', 'failed']
    ]);

    const lines = output.lines();
    expect(lines).toContain('4. Testing storage endpoints with project: p1');
    expect(lines).toContain('⚠️  File not found (expected for non-existent file)');
    expect(lines).toContain('Task: cat');
    expect(lines).toContain('  Original URL: s3://bucket/cat.jpg');
    expect(lines).toContain('  ✓ Resolved URL: https://files.test/cat.jpg');
    expect(lines).toContain('  ✓ File is accessible (HTTP 200)');
    expect(lines).toContain('Task: dog');
    expect(lines).toContain('  ⚠️  No resolved URL provided');
    expect(lines).not.toContain('Task: empty');
    expect(lines).not.toContain('Task: literal-null');
  });

  it('should report a generated presigned URL', async () => {
    stubFetch((url) => {
      if (url.endsWith('/projects')) return jsonResponse({ projects: [{ id: 7 }] });
      if (url.endsWith('/storage/test.jpg/url')) return jsonResponse({ download_url: 'https://files.test/signed' });
      if (url.endsWith('/tasks')) return jsonResponse({ tasks: [] });
      return jsonResponse({});
    });
    const { runner, output } = createRunner();

    const report = await runner.run();

    expect(report.projectId).toBe('7');
    expect(output.lines()).toContain('✓ Presigned URL generated successfully');
    expect(output.lines()).toContain('⚠️  No tasks with resource URLs found');
    expect(report.steps.find((step) => step.name === 'task-resources')?.outcome).toBe('skipped');
  });

  it('should keep going when individual endpoints fail', async () => {
    const fetchSpy = stubFetch((url) => {
      if (url.endsWith('/health')) throw new TypeError('fetch failed');
      if (url.endsWith('/me')) return jsonResponse({ error: 'Invalid token' }, 401);
      return jsonResponse({ projects: [] });
    });
    const { runner, output } = createRunner();

    const report = await runner.run();

    expect(requestedUrls(fetchSpy)).toHaveLength(3);
    expect(report.steps.slice(0, 3).map((step) => [step.name, step.outcome, step.statusCode])).toEqual([
      ['health', 'failed', undefined],
      ['user-info', 'failed', 401],
      ['projects-list', 'passed', 200]
    ]);
    expect(output.lines()).toContain('⚠️  Request failed: fetch failed');
  });

  it('should report a presigned URL request that never got a response', async () => {
    stubFetch((url) => {
      if (url.endsWith('/projects')) return jsonResponse({ projects: [{ id: 'p1' }] });
      if (url.endsWith('/storage/test.jpg/url')) throw new TypeError('fetch failed');
      if (url.endsWith('/tasks')) return jsonResponse({ tasks: [] });
      return jsonResponse({});
    });
    const { runner, output } = createRunner();

    const report = await runner.run();

    const lines = output.lines();
    const start = lines.indexOf("4b. Getting presigned URL for 'test.jpg'...");
    expect(lines.slice(start + 1, start + 3)).toEqual(['⚠️  Request failed: fetch failed', '']);
    expect(lines).not.toContain('⚠️  Failed to parse response');
    expect(report.steps.find((step) => step.name === 'presigned-url')).toEqual({
      name: 'presigned-url',
      outcome: 'failed',
      message: 'fetch failed'
    });
  });

  it('should print JSON bodies indented and other bodies as text', async () => {
    stubFetch((url) => {
      if (url.endsWith('/health')) return new Response('healthy', { status: 200 });
      if (url.endsWith('/me')) return jsonResponse({ id: 'user-1' });
      return jsonResponse({ projects: [] });
    });
    const { runner, output } = createRunner();

    await runner.run();

    expect(output.text()).toContain('1. Testing health endpoint...\nhealthy\n');
    expect(output.text()).toContain('2. Testing user info...\n{\n  "id": "user-1"\n}\n');
  });

  it('should report an unreachable download URL with status 0', async () => {
    stubFetch((url) => {
      if (url.endsWith('/projects')) return jsonResponse({ projects: [{ id: 'p1' }] });
      if (url.endsWith('/tasks')) {
        return jsonResponse({
          tasks: [{ name: 'cat', resource_url: 's3://bucket/cat.jpg', resolved_resource_url: 'https://files.test/cat.jpg' }]
        });
      }
      if (url.startsWith('https://files.test/')) throw new Error('The operation was aborted due to timeout');
      return jsonResponse({});
    });
    const { runner, output } = createRunner();

    await runner.run();

    expect(output.lines()).toContain('    Request error: The operation was aborted due to timeout');
    expect(output.lines()).toContain('  ⚠️  File not accessible (HTTP 0)');
  });
});

describe('extractFirstProjectId', () => {
  it('should take the id of the first project', () => {
    expect(extractFirstProjectId([{ id: 'p1' }, { id: 'p2' }])).toBe('p1');
  });

  it('should stringify numeric ids', () => {
    expect(extractFirstProjectId([{ id: 42 }])).toBe('42');
  });

  it.each([[undefined], [[]], [[{ name: 'no id' }]], [['p1']], [[{ id: '' }]]])(
    'should find no project in %j',
    (projects) => {
      expect(extractFirstProjectId(projects)).toBeNull();
    }
  );
});

describe('extractTaskResources', () => {
  it('should inspect at most the given number of tasks', () => {
    const tasks = Array.from({ length: 7 }, (_, index) => ({
      name: `task-${index}`,
      resource_url: `s3://bucket/${index}.jpg`,
      resolved_resource_url: `https://files.test/${index}.jpg`
    }));

    const resources = extractTaskResources(tasks, 5);

    expect(resources.map((resource) => resource.name)).toEqual(['task-0', 'task-1', 'task-2', 'task-3', 'task-4']);
  });

  it('should count skipped tasks against the limit', () => {
    const tasks = [
      { name: 'a', resource_url: null },
      { name: 'b', resource_url: 's3://bucket/b.jpg' }
    ];

    expect(extractTaskResources(tasks, 1)).toEqual([]);
  });

  it('should read the flat task shape only', () => {
    const tasks = [
      { task: { name: 'nested', resource_url: 's3://bucket/nested.jpg' }, resolved_resource_url: 'https://files.test/n.jpg' },
      { resource_url: 's3://bucket/anonymous.jpg' },
      'not-a-task'
    ];

    expect(extractTaskResources(tasks, 5)).toEqual([
      { name: 'Unknown', resourceUrl: 's3://bucket/anonymous.jpg', resolvedResourceUrl: null }
    ]);
  });
});
