import { Client, isFullPage } from '@notionhq/client';
import type { PageObjectResponse, QueryDatabaseParameters } from '@notionhq/client/build/src/api-endpoints.js';

import { CaseStatus, isCaseStatus } from './caseStatus.js';
import { RecordUpdateError, errorMessage } from './errors.js';
import { buildDownloadLinkSet } from './linkSet.js';
import type { CaseRecord, LinkSlotValue } from './types.js';

export type CaseField = 'sharedLink' | 'notes';

export interface RecordSource {
  findReady(limit?: number): Promise<CaseRecord[]>;
  setStatus(id: string, status: CaseStatus): Promise<void>;
  setField(id: string, field: CaseField, value: string): Promise<void>;
}

export interface NotionPropertyNames {
  status: string;
  linkSlots: string[];
  multiLinkSlot: string;
  credentials: string;
  suspect: string;
  sharedLink: string;
  notes: string;
}

export const DEFAULT_PROPERTY_NAMES: NotionPropertyNames = {
  status: 'Download Status',
  linkSlots: ['Download Link', 'Download Link (2)', 'Download Link (3)'],
  multiLinkSlot: 'Download Links (4)',
  credentials: 'Download Login',
  suspect: 'Suspect',
  sharedLink: 'Dropbox URL',
  notes: 'Download Notes',
};

// Notion caps page_size at 100
const MAX_PAGE_SIZE = 100;
// Notion caps a rich text item at 2000 characters
const MAX_TEXT_LENGTH = 2000;

type NotionProperty = PageObjectResponse['properties'][string];
type CasePage = Pick<PageObjectResponse, 'id' | 'properties'>;
type PageFilter = NonNullable<QueryDatabaseParameters['filter']>;

function plainText(items: ReadonlyArray<{ plain_text: string }>): string {
  return items.map(item => item.plain_text).join('');
}

export function readText(property: NotionProperty | undefined): string {
  if (!property) return '';
  switch (property.type) {
    case 'rich_text':
      return plainText(property.rich_text);
    case 'title':
      return plainText(property.title);
    case 'url':
      return property.url ?? '';
    default:
      return '';
  }
}

function readSelect(property: NotionProperty | undefined): string | null {
  // Filters and writes send the status as a select
  if (property?.type === 'select') return property.select?.name ?? null;
  return null;
}

function pageTitle(page: CasePage): string {
  for (const property of Object.values(page.properties)) {
    if (property.type === 'title') {
      const title = plainText(property.title).trim();
      if (title) return title;
    }
  }
  return 'Untitled';
}

/**
 * Maps a Notion page to a Case Record. The suspect name is the first line
 * of the suspect property, falling back to the page title.
 */
export function toCaseRecord(page: CasePage, names: NotionPropertyNames = DEFAULT_PROPERTY_NAMES): CaseRecord | null {
  const props = page.properties;
  const status = readSelect(props[names.status]);
  if (!status || !isCaseStatus(status)) return null;

  const title = pageTitle(page);
  const suspectLine = readText(props[names.suspect]).split('\n')[0].trim();

  const linkSlots: LinkSlotValue[] = [];
  for (const slot of [...names.linkSlots, names.multiLinkSlot]) {
    const value = readText(props[slot]);
    if (value.trim()) linkSlots.push({ slot, value });
  }

  return {
    id: page.id,
    status,
    title,
    suspectName: suspectLine || title,
    linkSlots,
    credentials: readText(props[names.credentials]),
    sharedLink: readText(props[names.sharedLink]) || null,
  };
}

export function buildStatusFilter(status: CaseStatus, names: NotionPropertyNames = DEFAULT_PROPERTY_NAMES): PageFilter {
  return { property: names.status, select: { equals: status } };
}

export class NotionCaseSource implements RecordSource {
  private readonly client: Client;
  private readonly databaseId: string;
  private readonly names: NotionPropertyNames;

  constructor(client: Client, databaseId: string, names: NotionPropertyNames = DEFAULT_PROPERTY_NAMES) {
    this.client = client;
    this.databaseId = databaseId;
    this.names = names;
  }

  /**
   * Ready cases with a non-empty link set; pages through the whole database
   * unless `limit` caps it.
   */
  async findReady(limit?: number): Promise<CaseRecord[]> {
    const records = await this.findByStatus(CaseStatus.Ready, limit, record => buildDownloadLinkSet(record).length > 0);
    console.log(`[NotionCases] Found ${records.length} case(s) ready for download`);
    return records;
  }

  async findByStatus(
    status: CaseStatus,
    limit?: number,
    accept: (record: CaseRecord) => boolean = () => true,
  ): Promise<CaseRecord[]> {
    const records: CaseRecord[] = [];
    let cursor: string | undefined;

    do {
      const response = await this.client.databases.query({
        database_id: this.databaseId,
        filter: buildStatusFilter(status, this.names),
        page_size: MAX_PAGE_SIZE,
        start_cursor: cursor,
      });

      for (const page of response.results) {
        if (!isFullPage(page)) continue;
        const record = toCaseRecord(page, this.names);
        if (record && accept(record)) records.push(record);
        if (limit !== undefined && records.length >= limit) return records;
      }

      cursor = response.has_more ? response.next_cursor ?? undefined : undefined;
    } while (cursor);

    return records;
  }

  async setStatus(id: string, status: CaseStatus): Promise<void> {
    await this.update(id, `status -> ${status}`, {
      [this.names.status]: { select: { name: status } },
    });
    console.log(`[NotionCases] ${id}: status -> ${status}`);
  }

  async setField(id: string, field: CaseField, value: string): Promise<void> {
    if (field === 'sharedLink') {
      await this.update(id, field, { [this.names.sharedLink]: { url: value || null } });
      return;
    }
    await this.update(id, field, {
      [this.names.notes]: {
        rich_text: value ? [{ type: 'text', text: { content: Array.from(value).slice(0, MAX_TEXT_LENGTH).join('') } }] : [],
      },
    });
  }

  private async update(id: string, what: string, properties: Parameters<Client['pages']['update']>[0]['properties']) {
    try {
      await this.client.pages.update({ page_id: id, properties });
    } catch (error) {
      throw new RecordUpdateError(id, `Updating ${what} on ${id} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
