// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { NetworkError } from "./error.js";
import type { Mailbox } from "./mailbox.js";
import type { Message } from "./types.js";

/**
 * Receiving end of a network. Created by `NetworkBuilder.addSubscriber()`
 * during setup; owns exactly one mailbox.
 *
 * Reads never block: `fetch()` and `drain()` only see what is already queued.
 */
export class Subscriber<Topic, Content> {
  constructor(
    private readonly mailbox: Mailbox<Topic, Content>,
    /** Topics this subscriber was registered with, in registration order. */
    readonly topics: readonly Topic[],
  ) {}

  get closed(): boolean {
    return this.mailbox.closed;
  }

  /**
   * Consumes all pending messages, oldest first. Returns an empty array when
   * nothing is queued.
   */
  fetch(): Message<Topic, Content>[] {
    this.assertOpen();
    return this.mailbox.drain();
  }

  /**
   * Lazy form of `fetch()`: yields the messages queued at call time one by
   * one, removing each as it is yielded. Messages published after the call
   * stay queued for the next one.
   *
   * @throws {NetworkError} SUBSCRIBER_CLOSED when called after `close()`
   */
  drain(): IterableIterator<Message<Topic, Content>> {
    this.assertOpen();
    return this.takeThrough(this.mailbox.sequence);
  }

  /**
   * Releases the mailbox. Pending messages are discarded and later publishes
   * to this subscriber are dropped. Idempotent.
   */
  close(): void {
    this.mailbox.close();
  }

  private *takeThrough(end: number): IterableIterator<Message<Topic, Content>> {
    while (this.mailbox.consumed < end) {
      const message = this.mailbox.shift();
      if (message === undefined) return;
      yield message;
    }
  }

  private assertOpen(): void {
    if (this.mailbox.closed) {
      throw new NetworkError("SUBSCRIBER_CLOSED", "Subscriber has been closed");
    }
  }
}
