import { ActivityMap } from '../types';
import { ActivityStore } from './stores/ActivityStore';
import { DocumentStore } from './stores/DocumentStore';
import defaultSeed from './seed/activities.json';

export { ActivityStore, DocumentStore };

/**
 * Process-wide in-memory state. Nothing here survives a restart.
 */
export interface Store {
  activities: ActivityStore;
  documents: DocumentStore;
}

export function createStore(seed: ActivityMap = defaultSeed): Store {
  return {
    activities: new ActivityStore(seed),
    documents: new DocumentStore()
  };
}
