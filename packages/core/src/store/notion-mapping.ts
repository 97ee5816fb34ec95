/**
 * Translation between the uniform task shape and Notion pages, where a task is
 * a page in a database with a title property (name) and a status property.
 */

import type { isFullPage } from '@notionhq/client';
import type { TaskRecord } from '../types/task.js';
import type { TaskStatus } from '../types/task-status.js';
import { isTaskStatus } from '../types/task-status.js';

type PageLike = Parameters<typeof isFullPage>[0];
export type NotionPage = Extract<PageLike, { object: 'page'; url: string }>;
type PageProperty = NotionPage['properties'][string];

export interface NotionPropertyNames {
  /** Title property holding the task name */
  name: string;
  /** Status property holding one of the three task statuses */
  status: string;
}

export const DEFAULT_PROPERTY_NAMES: NotionPropertyNames = {
  name: 'Name',
  status: 'Status',
};

export class MalformedPageError extends Error {
  constructor(
    readonly pageId: string,
    detail: string,
  ) {
    super(`Page ${pageId} is not a task: ${detail}`);
    this.name = 'MalformedPageError';
  }
}

function requireProperty(page: NotionPage, name: string): PageProperty {
  const prop = page.properties[name];
  if (!prop) throw new MalformedPageError(page.id, `missing property '${name}'`);
  return prop;
}

function readName(page: NotionPage, property: string): string {
  const prop = requireProperty(page, property);
  if (prop.type !== 'title') {
    throw new MalformedPageError(page.id, `property '${property}' is not a title`);
  }
  const first = prop.title[0];
  if (!first) throw new MalformedPageError(page.id, `title '${property}' is empty`);
  return first.plain_text;
}

function readStatus(page: NotionPage, property: string): TaskStatus {
  const prop = requireProperty(page, property);
  if (prop.type !== 'status') {
    throw new MalformedPageError(page.id, `property '${property}' is not a status`);
  }
  const name = prop.status?.name;
  if (name == null) throw new MalformedPageError(page.id, `status '${property}' is not set`);
  if (!isTaskStatus(name)) throw new MalformedPageError(page.id, `unknown status '${name}'`);
  return name;
}

/** Map a page to a task; throws MalformedPageError when a property is absent or empty */
export function pageToRecord(page: NotionPage, names: NotionPropertyNames): TaskRecord {
  return {
    id: page.id,
    name: readName(page, names.name),
    status: readStatus(page, names.status),
    archived: page.archived,
  };
}

export function titleValue(content: string) {
  return { title: [{ text: { content } }] };
}

export function statusValue(name: TaskStatus) {
  return { status: { name } };
}
