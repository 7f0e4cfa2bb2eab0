import { describeItems, offerItemSchema, storedRecordSchema } from '../domain/entities.js';
import { DEFAULT_SETTINGS, createServices } from '../services.js';
import { createMemoryStores } from './memory-stores.js';

export const NOW = new Date('2026-03-01T10:00:00.000Z');

/** Full service graph over memory stores, with a fixed clock and a few reference rows. */
export function createTestServices() {
  const stores = createMemoryStores();
  const services = createServices(stores, DEFAULT_SETTINGS, { now: () => NOW });

  stores.relational.seed('company', [{ id: 'c1', name: 'Acme GmbH', contact_user_id: 'u-contact' }]);
  stores.relational.seed('technician', [
    { id: 't1', name: 'Tess', is_active: true, availability: null },
    { id: 't2', name: 'Theo', is_active: false, availability: null },
  ]);

  return { ...services, stores };
}

export type TestServices = ReturnType<typeof createTestServices>;

const stamp = '2026-01-01T00:00:00.000Z';

export function offerRow(overrides: Record<string, unknown> & { id: string }) {
  const items = offerItemSchema.array().parse(overrides.items ?? [{ description: 'Heat pump', quantity: 1, unit_price: 100 }]);
  return storedRecordSchema.parse({
    version: 1,
    created_at: stamp,
    updated_at: stamp,
    deleted_at: null,
    lead_id: 'lead-1',
    amount: 100,
    items,
    item_text: describeItems(items),
    status: 'draft',
    valid_until: null,
    sent_at: null,
    decided_at: null,
    notes: null,
    ...overrides,
  });
}

export function installationRow(overrides: Record<string, unknown> & { id: string }) {
  return storedRecordSchema.parse({
    version: 1,
    created_at: stamp,
    updated_at: stamp,
    deleted_at: null,
    lead_id: 'lead-1',
    offer_id: overrides.id,
    company_id: 'c1',
    scheduled_date: null,
    technician_id: null,
    deadline_at: null,
    status: 'pending',
    started_at: null,
    finished_at: null,
    notes: null,
    ...overrides,
  });
}

export function leadRow(overrides: Record<string, unknown> & { id: string }) {
  return storedRecordSchema.parse({
    version: 1,
    created_at: stamp,
    updated_at: stamp,
    deleted_at: null,
    company_id: 'c1',
    company_name: 'Acme GmbH',
    contact_name: null,
    email: null,
    phone: null,
    owner_user_id: 'u-owner',
    status: 'new',
    notes: null,
    loss_reason: null,
    lead_source: null,
    ...overrides,
  });
}
