/**
 * Remote Client contract
 *
 * The engine never talks to the streaming service directly. A Remote Client
 * performs authenticated requests and hands back structured data; it reports
 * failures as AuthExpiredError, RateLimitedError, NetworkError or
 * NotFoundError (see remoteErrorFromStatus for HTTP-backed clients).
 */

import type { EntityClass, EntityDelta, StreamLocation } from '../types/index.js';

export interface RequestOptions {
  /** Aborted when the engine gives up on the request (timeout or cancel) */
  signal?: AbortSignal;
}

export interface RemoteClient {
  /**
   * Changes to one entity class since `checkpoint`, or everything when the
   * checkpoint is null.
   */
  fetchDelta<C extends EntityClass>(
    entityClass: C,
    checkpoint: string | null,
    options?: RequestOptions,
  ): Promise<EntityDelta<C>>;

  /** Exchange a track's stream token for a playable, time-limited URL. */
  resolveStreamUrl(trackId: string, options?: RequestOptions): Promise<StreamLocation>;
}
