// apps/backend/src/lib/provider-store.ts
import type { ProviderProfile } from '@proposal-desk/prompts'
import type { ContactBlock } from '../narrative/types.js'

export type ProviderRecord = ProviderProfile & { id: number }

export type ProviderListItem = Pick<ProviderRecord, 'id' | 'name' | 'industry'>

export interface ProviderRepository {
  create(profile: ProviderProfile): Promise<ProviderRecord>
  list(): Promise<ProviderListItem[]>
  get(id: number): Promise<ProviderRecord | null>
}

/** Process-local provider profiles; swap for a database-backed repository in deployment */
export class InMemoryProviderRepository implements ProviderRepository {
  private readonly rows = new Map<number, ProviderRecord>()
  private nextId = 1

  async create(profile: ProviderProfile): Promise<ProviderRecord> {
    const record: ProviderRecord = { ...profile, id: this.nextId++ }
    this.rows.set(record.id, record)
    return { ...record }
  }

  async list(): Promise<ProviderListItem[]> {
    return Array.from(this.rows.values())
      .map(({ id, name, industry }) => ({ id, name, industry }))
      .sort((a, b) => a.name.localeCompare(b.name))
  }

  async get(id: number): Promise<ProviderRecord | null> {
    const row = this.rows.get(id)
    return row ? { ...row } : null
  }
}

export function contactFromProvider(provider: ProviderRecord): ContactBlock {
  return { email: provider.contactEmail, phone: provider.contactPhone, website: provider.website }
}
