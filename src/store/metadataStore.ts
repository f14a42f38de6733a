import type { Metadata } from '../types/image.js';

/**
 * Where the demo server keeps the metadata of images it has uploaded or
 * claimed.
 */
export interface MetadataStore {
  insert(metadata: Metadata): Promise<void>;
  deleteById(id: string): Promise<void>;
  /** Snapshot of stored metadata in insertion order. */
  list(): Promise<Metadata[]>;
}

function copy(metadata: Metadata): Metadata {
  return { ...metadata, timeCreated: new Date(metadata.timeCreated.getTime()) };
}

/**
 * Process-local store. Not persisted; everything is lost on restart.
 */
export class InMemoryMetadataStore implements MetadataStore {
  private items: Metadata[] = [];

  async insert(metadata: Metadata): Promise<void> {
    this.items.push(copy(metadata));
  }

  async deleteById(id: string): Promise<void> {
    this.items = this.items.filter((item) => item.id !== id);
  }

  async list(): Promise<Metadata[]> {
    return this.items.map(copy);
  }
}
