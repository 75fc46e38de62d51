import type { SnapshotMessageCache } from '../../services/messageCache.js';
import type { StarboardService } from '../../starboard/starboardService.js';

export interface EventContext {
  service: StarboardService;
  cache: SnapshotMessageCache;
}
