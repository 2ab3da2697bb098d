/**
 * Resource store: entities, seeding and the store-wide lock.
 */

import { seedStore } from './seed.ts';
import { ResourceStore } from './store.ts';

export * from './types.ts';
export { ReadWriteLock } from './lock.ts';
export { loadSeedData, seedStore, type SeedData } from './seed.ts';
export {
  ResourceStore,
  documentId,
  newDocument,
  newProject,
  newUser,
  newWorkItem,
  shortWorkItemId,
  type NewDocumentInput,
  type NewProjectInput,
  type NewUserInput,
  type NewWorkItemAttributes,
} from './store.ts';

/** A fresh store populated with the fixture data. */
export function createSeededStore(): ResourceStore {
  const store = new ResourceStore();
  seedStore(store);
  return store;
}
