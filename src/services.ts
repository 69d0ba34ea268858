import type { Store } from './store/store.js';
import type { EventBroadcaster } from './events/broadcaster.js';

/**
 * Long-lived collaborators handed to every task and route
 */
export interface Services {
  store: Store;
  broadcaster: EventBroadcaster;
}
