import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NotionTaskStore, toFailure } from '../../src/store/notion-store.js';
import { TaskStatus } from '../../src/types/task-status.js';
import {
  setupNotionMock, cleanupNotionMock, createPageFixture,
  DATABASE_ID, NOTION_API,
} from '../helpers/notion-mock.js';
import type { NotionMock } from '../helpers/notion-mock.js';

let mock: NotionMock;
let store: NotionTaskStore;

beforeEach(() => {
  mock = setupNotionMock();
  store = new NotionTaskStore({ auth: 'test-token', databaseId: DATABASE_ID, baseUrl: NOTION_API });
});

afterEach(() => {
  cleanupNotionMock();
});

describe('list', () => {
  it('maps database pages to tasks', async () => {
    mock.query([
      createPageFixture('page-1', 'Alpha', 'Not started'),
      createPageFixture('page-2', 'Beta', 'Done'),
    ]);

    const result = await store.list();

    expect(result).toEqual({
      type: 'success',
      data: [
        { id: 'page-1', name: 'Alpha', status: TaskStatus.NotStarted },
        { id: 'page-2', name: 'Beta', status: TaskStatus.Done },
      ],
    });
    mock.done();
  });

  it('follows pagination cursors', async () => {
    mock.query([createPageFixture('page-1', 'Alpha', 'Done')], 'cursor-2');
    mock.query([createPageFixture('page-2', 'Beta', 'In progress')]);

    const result = await store.list();

    expect(result.type === 'success' && result.data.map(t => t.id)).toEqual(['page-1', 'page-2']);
    expect(mock.queryBodies[1]?.['start_cursor']).toBe('cursor-2');
    mock.done();
  });

  it('sends a status filter', async () => {
    mock.query([createPageFixture('page-2', 'Beta', 'Done')]);

    await store.list(TaskStatus.Done);

    expect(mock.queryBodies[0]?.['filter']).toEqual({
      property: 'Status',
      status: { equals: 'Done' },
    });
  });

  it('reads custom property names', async () => {
    const custom = new NotionTaskStore({
      auth: 'test-token',
      databaseId: DATABASE_ID,
      baseUrl: NOTION_API,
      properties: { name: 'Task', status: 'State' },
    });
    const page = createPageFixture('page-1', 'Alpha', 'In progress');
    mock.query([{
      ...page,
      properties: { Task: page.properties['Name'], State: page.properties['Status'] },
    }]);

    const result = await custom.list();

    expect(result).toEqual({
      type: 'success',
      data: [{ id: 'page-1', name: 'Alpha', status: TaskStatus.InProgress }],
    });
  });

  it('fails on a page with an unknown status', async () => {
    mock.query([createPageFixture('page-1', 'Alpha', 'Blocked')]);

    expect(await store.list()).toEqual({
      type: 'error',
      message: "Page page-1 is not a task: unknown status 'Blocked'",
    });
  });

  it('fails on a page without the title property', async () => {
    const page = createPageFixture('page-1', 'Alpha', 'Done');
    mock.query([{ ...page, properties: { Status: page.properties['Status'] } }]);

    expect(await store.list()).toEqual({
      type: 'error',
      message: "Page page-1 is not a task: missing property 'Name'",
    });
  });

  it('reports a bad token as unauthorized', async () => {
    mock.queryError(401, 'unauthorized', 'API token is invalid.');

    expect(await store.list()).toEqual({ type: 'unauthorized', message: 'API token is invalid.' });
  });

  it('reports an unshared database as unauthorized', async () => {
    mock.queryError(404, 'object_not_found', `Could not find database with ID: ${DATABASE_ID}.`);

    expect(await store.list()).toEqual({
      type: 'unauthorized',
      message: `Could not find database with ID: ${DATABASE_ID}. (is the database shared with the integration?)`,
    });
  });

  it('reports server errors', async () => {
    mock.queryError(500, 'internal_server_error', 'Unexpected error.');

    expect(await store.list()).toEqual({ type: 'error', message: 'Unexpected error.' });
  });
});

describe('get', () => {
  it('returns the archived flag', async () => {
    mock.retrieve(createPageFixture('page-1', 'Alpha', 'Done', { archived: true }));

    expect(await store.get('page-1')).toEqual({
      type: 'success',
      data: { id: 'page-1', name: 'Alpha', status: TaskStatus.Done, archived: true },
    });
  });

  it('returns not-found for an unknown page', async () => {
    mock.retrieveError('page-9', 404, 'object_not_found', 'Could not find page with ID: page-9.');

    expect(await store.get('page-9')).toEqual({ type: 'not-found', taskId: 'page-9' });
  });
});

describe('add', () => {
  it('creates a page in the database and returns the task', async () => {
    mock.create(createPageFixture('page-new', 'New task', 'Not started'));

    const result = await store.add('  New task ');

    expect(result).toEqual({
      type: 'success',
      data: { id: 'page-new', name: 'New task', status: TaskStatus.NotStarted },
    });
    expect(mock.createBodies).toEqual([{
      parent: { database_id: DATABASE_ID },
      properties: {
        Name: { title: [{ text: { content: 'New task' } }] },
        Status: { status: { name: 'Not started' } },
      },
    }]);
    mock.done();
  });

  it('rejects an empty name before calling the API', async () => {
    expect(await store.add('')).toEqual({ type: 'invalid', message: 'Task name must not be empty' });
    expect(mock.createBodies).toEqual([]);
  });

  it('maps API validation errors to invalid', async () => {
    mock.createError(400, 'validation_error', 'Status is expected to be status.');

    expect(await store.add('x', TaskStatus.Done)).toEqual({
      type: 'invalid',
      message: 'Status is expected to be status.',
    });
  });
});

describe('delete and restore', () => {
  it('archives the page', async () => {
    mock.update(createPageFixture('page-1', 'Alpha', 'Done', { archived: true }));

    expect(await store.delete('page-1')).toEqual({ type: 'success', data: { id: 'page-1', archived: true } });
    expect(mock.updates).toEqual([{ pageId: 'page-1', body: { archived: true } }]);
  });

  it('unarchives the page', async () => {
    mock.update(createPageFixture('page-1', 'Alpha', 'Done'));

    expect(await store.restore('page-1')).toEqual({ type: 'success', data: { id: 'page-1', archived: false } });
    expect(mock.updates).toEqual([{ pageId: 'page-1', body: { archived: false } }]);
  });

  it('returns not-found for an unknown page', async () => {
    mock.updateError('page-9', 404, 'object_not_found', 'Could not find page with ID: page-9.');

    expect(await store.delete('page-9')).toEqual({ type: 'not-found', taskId: 'page-9' });
  });
});

describe('updates', () => {
  it('sets the status property', async () => {
    mock.update(createPageFixture('page-1', 'Alpha', 'Done'));

    expect(await store.updateStatus('page-1', TaskStatus.Done)).toEqual({
      type: 'success',
      data: { id: 'page-1', status: TaskStatus.Done },
    });
    expect(mock.updates[0]?.body).toEqual({ properties: { Status: { status: { name: 'Done' } } } });
  });

  it('setting the same status twice sends the same update', async () => {
    mock.update(createPageFixture('page-1', 'Alpha', 'Done'));
    mock.update(createPageFixture('page-1', 'Alpha', 'Done'));
    mock.retrieve(createPageFixture('page-1', 'Alpha', 'Done'));

    const first = await store.updateStatus('page-1', TaskStatus.Done);
    const second = await store.updateStatus('page-1', TaskStatus.Done);

    expect(second).toEqual(first);
    expect(mock.updates.map(u => u.body)).toEqual([
      { properties: { Status: { status: { name: 'Done' } } } },
      { properties: { Status: { status: { name: 'Done' } } } },
    ]);
    expect(await store.get('page-1')).toEqual({
      type: 'success',
      data: { id: 'page-1', name: 'Alpha', status: TaskStatus.Done, archived: false },
    });
    mock.done();
  });

  it('sets the title property with a trimmed name', async () => {
    mock.update(createPageFixture('page-1', 'Renamed', 'Done'));

    expect(await store.updateName('page-1', ' Renamed ')).toEqual({
      type: 'success',
      data: { id: 'page-1', name: 'Renamed' },
    });
    expect(mock.updates[0]?.body).toEqual({ properties: { Name: { title: [{ text: { content: 'Renamed' } }] } } });
  });

  it('rejects an empty name before calling the API', async () => {
    expect(await store.updateName('page-1', ' ')).toEqual({ type: 'invalid', message: 'Task name must not be empty' });
    expect(mock.updates).toEqual([]);
  });
});

describe('clearAll', () => {
  it('archives every listed page and collects failures', async () => {
    mock.query([
      createPageFixture('page-1', 'Alpha', 'Done'),
      createPageFixture('page-2', 'Beta', 'Done'),
      createPageFixture('page-3', 'Gamma', 'Not started'),
    ]);
    mock.update(createPageFixture('page-1', 'Alpha', 'Done', { archived: true }));
    mock.updateError('page-2', 500, 'internal_server_error', 'Unexpected error.');
    mock.update(createPageFixture('page-3', 'Gamma', 'Not started', { archived: true }));

    expect(await store.clearAll()).toEqual({
      type: 'success',
      data: { cleared: 2, failedIds: ['page-2'] },
    });
    mock.done();
  });

  it('fails when the database cannot be read', async () => {
    mock.queryError(401, 'unauthorized', 'API token is invalid.');

    expect(await store.clearAll()).toEqual({ type: 'unauthorized', message: 'API token is invalid.' });
  });
});

describe('clearByStatus', () => {
  it('only archives pages matching the filter', async () => {
    mock.query([createPageFixture('page-2', 'Beta', 'Done')]);
    mock.update(createPageFixture('page-2', 'Beta', 'Done', { archived: true }));

    expect(await store.clearByStatus(TaskStatus.Done)).toEqual({
      type: 'success',
      data: { cleared: 1, failedIds: [] },
    });
    expect(mock.queryBodies[0]?.['filter']).toEqual({ property: 'Status', status: { equals: 'Done' } });
    expect(mock.updates.map(u => u.pageId)).toEqual(['page-2']);
  });
});

describe('describe', () => {
  it('names the database', () => {
    expect(store.describe()).toBe(`notion:${DATABASE_ID}`);
  });
});

describe('toFailure', () => {
  it('treats unknown errors as generic failures', () => {
    expect(toFailure(new Error('socket hang up'), 'page-1')).toEqual({ type: 'error', message: 'socket hang up' });
    expect(toFailure('boom')).toEqual({ type: 'error', message: 'boom' });
  });
});
