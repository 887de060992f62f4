// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LOG_CONTEXT } from "./constants.js";
import { NetworkError } from "./error.js";
import { Mailbox } from "./mailbox.js";
import {
  normalizeOptions,
  type NetworkOptions,
  type ResolvedOptions,
} from "./options.js";
import { Publisher } from "./publisher.js";
import { RegistryBuilder } from "./registry.js";
import { Subscriber } from "./subscriber.js";

/**
 * Setup phase of a network. Register every subscriber, then call `build()`
 * to open the network for publishing.
 *
 * `build()` hands the registry to the returned Publisher, whose type offers
 * no way to register subscribers. The builder is spent afterwards.
 */
export class NetworkBuilder<Topic, Content> {
  private readonly registry = new RegistryBuilder<Topic, Content>();
  private readonly options: ResolvedOptions<Content>;

  constructor(options?: NetworkOptions<Content>) {
    this.options = normalizeOptions(options);
  }

  /**
   * Adds a subscriber with the complete list of topics it expects to
   * receive. The list cannot be changed later.
   *
   * A topic listed twice registers the mailbox twice, so that subscriber
   * receives each message on the topic twice.
   *
   * @throws {NetworkError} NETWORK_SEALED after `build()`
   */
  addSubscriber(topics: Iterable<Topic>): Subscriber<Topic, Content> {
    this.assertOpen();

    const list = Object.freeze(Array.from(topics));
    const mailbox = new Mailbox<Topic, Content>(this.options.mailboxCapacity);
    const sender = mailbox.sender();
    for (const topic of list) {
      this.registry.attach(topic, sender);
    }

    this.options.logger.debug(LOG_CONTEXT.REGISTRY, "Subscriber registered", {
      topics: list,
    });
    return new Subscriber(mailbox, list);
  }

  /**
   * Finishes network setup. No more subscribers can be added after this.
   *
   * @throws {NetworkError} NETWORK_SEALED when called a second time
   */
  build(): Publisher<Topic, Content> {
    const registry = this.registry.seal();
    if (!registry) {
      throw sealedError();
    }

    this.options.logger.debug(LOG_CONTEXT.REGISTRY, "Network sealed", {
      topics: registry.size,
    });
    return new Publisher(registry, this.options);
  }

  private assertOpen(): void {
    if (this.registry.sealed) {
      throw sealedError();
    }
  }
}

function sealedError(): NetworkError {
  return new NetworkError(
    "NETWORK_SEALED",
    "Network setup is complete; build() has already been called",
  );
}

/**
 * Starts assembling a new, independent network.
 *
 * @example
 * ```typescript
 * import { createNetwork } from "@topicbus/core";
 *
 * const builder = createNetwork<string, string>();
 * const subscriber = builder.addSubscriber(["widgets"]);
 * const publisher = builder.build();
 *
 * publisher.publish("widgets", "sprocket");
 *
 * for (const [topic, content] of subscriber.fetch()) {
 *   console.log(`${topic}: ${content}`);
 * }
 * ```
 *
 * @throws {NetworkError} INVALID_OPTIONS when options fail validation
 */
export function createNetwork<Topic, Content>(
  options?: NetworkOptions<Content>,
): NetworkBuilder<Topic, Content> {
  return new NetworkBuilder(options);
}
