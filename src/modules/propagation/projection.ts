import type { SearchableEntityType, SearchProjection, StoredRecord } from '../../domain/entities.js';

export interface SearchDescriptor {
  /** Relational columns whose text ends up in the projection's title/body. */
  textColumns: string[];
  /** The first non-empty one becomes the title. */
  titleColumns: string[];
  statusColumn: string | null;
  ownerColumn: string | null;
  companyColumn: string | null;
}

export const SEARCH_DESCRIPTORS: Record<SearchableEntityType, SearchDescriptor> = {
  lead: {
    titleColumns: ['company_name'],
    textColumns: ['company_name', 'contact_name', 'email', 'phone', 'notes', 'lead_source'],
    statusColumn: 'status',
    ownerColumn: 'owner_user_id',
    companyColumn: 'company_id',
  },
  offer: {
    titleColumns: ['item_text', 'notes'],
    textColumns: ['item_text', 'notes'],
    statusColumn: 'status',
    ownerColumn: null,
    companyColumn: null,
  },
  installation: {
    titleColumns: ['notes'],
    textColumns: ['notes'],
    statusColumn: 'status',
    ownerColumn: 'technician_id',
    companyColumn: 'company_id',
  },
  document: {
    titleColumns: ['title'],
    textColumns: ['title', 'description', 'solution'],
    statusColumn: 'status',
    ownerColumn: null,
    companyColumn: null,
  },
};

function text(record: StoredRecord, column: string | null): string | null {
  if (!column) return null;
  const value = record[column];
  if (value === null || value === undefined || value === '') return null;
  return typeof value === 'string' ? value : String(value);
}

function joined(record: StoredRecord, columns: string[]): string {
  return columns
    .map((column) => text(record, column))
    .filter((value): value is string => value !== null)
    .join(' ');
}

export function toProjection(entityType: SearchableEntityType, record: StoredRecord): SearchProjection {
  const descriptor = SEARCH_DESCRIPTORS[entityType];
  const title = descriptor.titleColumns.map((column) => text(record, column)).find((value) => value !== null) ?? '';

  return {
    entity_type: entityType,
    id: record.id,
    version: record.version,
    title,
    body: joined(record, descriptor.textColumns),
    status: text(record, descriptor.statusColumn),
    owner_id: text(record, descriptor.ownerColumn),
    company_id: text(record, descriptor.companyColumn),
    created_at: record.created_at,
    updated_at: record.updated_at,
    deleted: record.deleted_at !== null,
  };
}

/** Stand-in for a record that no longer exists in the system of record. */
export function tombstone(entityType: SearchableEntityType, id: string, version: number, at: string): SearchProjection {
  return {
    entity_type: entityType,
    id,
    version,
    title: '',
    body: '',
    status: null,
    owner_id: null,
    company_id: null,
    created_at: at,
    updated_at: at,
    deleted: true,
  };
}
