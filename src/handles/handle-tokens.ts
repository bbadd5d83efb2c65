// Bearer tokens for handles handed to network clients.
//
// Handles are sequential, so a client that holds one can name its
// neighbours. The gateway never shows them: each issued handle gets a random
// UUID and clients address their Operator by that token alone. A token keeps
// pointing at its handle after release, so it answers
// STORAGE_USED_AFTER_RELEASE like the handle does; a token that was never
// issued is HANDLE_INVALID.

import { randomUUID } from 'node:crypto';

import type { Handle } from './handle-manager.js';
import { HandleInvalidError } from '../errors/index.js';

export class HandleTokens {
  private readonly byToken = new Map<string, Handle>();

  get size(): number {
    return this.byToken.size;
  }

  issue(handle: Handle): string {
    const token = randomUUID();
    this.byToken.set(token, handle);
    return token;
  }

  /** The handle behind a token. Throws HandleInvalidError for unknown tokens. */
  resolve(token: string): Handle {
    const handle = this.byToken.get(token);
    if (handle === undefined) {
      throw new HandleInvalidError(token);
    }
    return handle;
  }

  /** Forget every token (server shutdown, after the handles are released) */
  clear(): void {
    this.byToken.clear();
  }
}
