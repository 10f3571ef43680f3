/**
 * Outbound notification of records an import creates
 */

import type { Broadcaster, BroadcastMetadata, Review } from '../types.js';

/**
 * Writes each broadcast to the log. Stands in for federation delivery,
 * which lives outside this service.
 */
export class LogBroadcaster implements Broadcaster {
  broadcast(record: Review, metadata: BroadcastMetadata): void {
    console.log(
      `[Broadcast] ${record.kind} ${record.id} for book ${record.bookId} ` +
      `(privacy=${record.privacy}, software=${metadata.software}, priority=${metadata.priority})`
    );
  }
}
