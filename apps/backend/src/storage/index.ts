import type { ResourceStore } from './types.js';
import { LocalResourceStore } from './localResourceStore.js';

export type { ResourceSnapshot, ResourceStore } from './types.js';
export { LocalResourceStore, computeEtag } from './localResourceStore.js';

export function createResourceStore(resourceFile: string): ResourceStore {
  return new LocalResourceStore(resourceFile);
}
