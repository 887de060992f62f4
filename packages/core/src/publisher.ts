// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LOG_CONTEXT } from "./constants.js";
import type { ResolvedOptions } from "./options.js";
import type { Registry } from "./registry.js";

/**
 * Sending end of a built network. To add more publishers, call `clone()` and
 * hand the clones to other components; every clone shares one registry.
 *
 * All topic filtering happens here, in the publishing call: subscribers only
 * ever receive topics they registered for.
 */
export class Publisher<Topic, Content> {
  /**
   * @internal Obtain publishers from `NetworkBuilder.build()` or `clone()`.
   */
  constructor(
    private readonly registry: Registry<Topic, Content>,
    private readonly options: ResolvedOptions<Content>,
  ) {}

  /**
   * Delivers a copy of `content` to every subscriber of `topic`, in
   * registration order. A topic without subscribers is a no-op.
   *
   * Never throws: a subscriber whose mailbox is closed, collected or full
   * misses the message and the others still receive it.
   */
  publish(topic: Topic, content: Content): void {
    const outbox = this.registry.lookup(topic);
    if (!outbox) return;

    const { clone, logger } = this.options;
    for (const sender of outbox) {
      let copy: Content;
      try {
        copy = clone(content);
      } catch (error) {
        logger.warn(LOG_CONTEXT.PUBLISH, "Content clone failed, delivery skipped", {
          topic,
          error,
        });
        continue;
      }

      if (!sender.send([topic, copy])) {
        logger.debug(LOG_CONTEXT.MAILBOX, "Mailbox rejected message", { topic });
      }
    }
  }

  /**
   * New publisher handle on the same network.
   */
  clone(): Publisher<Topic, Content> {
    return new Publisher(this.registry, this.options);
  }

  /**
   * Whether at least one subscriber registered for `topic`.
   */
  hasTopic(topic: Topic): boolean {
    return this.registry.has(topic);
  }

  listTopics(): readonly Topic[] {
    return this.registry.topics();
  }
}
