// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { MailboxSender } from "./types.js";

/**
 * Read-only topic index of a built network.
 *
 * Lists keep registration order, which is the fan-out order for the topic.
 */
export interface Registry<Topic, Content> {
  readonly size: number;
  lookup(topic: Topic): readonly MailboxSender<Topic, Content>[] | undefined;
  has(topic: Topic): boolean;
  topics(): readonly Topic[];
}

/**
 * Mutable topic index used during setup.
 *
 * `seal()` hands the index over to a frozen Registry exactly once; the
 * builder keeps no reference to it afterwards.
 */
export class RegistryBuilder<Topic, Content> {
  private entries: Map<Topic, MailboxSender<Topic, Content>[]> | undefined =
    new Map();

  get sealed(): boolean {
    return this.entries === undefined;
  }

  /**
   * Append `sender` to the topic's list, creating the list if absent.
   * Returns false once sealed.
   */
  attach(topic: Topic, sender: MailboxSender<Topic, Content>): boolean {
    if (!this.entries) return false;
    const list = this.entries.get(topic);
    if (list) {
      list.push(sender);
    } else {
      this.entries.set(topic, [sender]);
    }
    return true;
  }

  seal(): Registry<Topic, Content> | undefined {
    const entries = this.entries;
    if (!entries) return undefined;
    this.entries = undefined;

    for (const list of entries.values()) {
      Object.freeze(list);
    }
    const topics = Object.freeze(Array.from(entries.keys()));

    return Object.freeze({
      size: entries.size,
      lookup: (topic: Topic) => entries.get(topic),
      has: (topic: Topic) => entries.has(topic),
      topics: () => topics,
    });
  }
}
