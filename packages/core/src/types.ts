// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * A delivered message: the topic it was published under and the subscriber's
 * own copy of the content.
 */
export type Message<Topic, Content> = readonly [topic: Topic, content: Content];

/**
 * Producing side of a mailbox, as stored in the registry.
 */
export interface MailboxSender<Topic, Content> {
  /**
   * Enqueue a message. Returns `false` when the mailbox can no longer accept
   * it (closed, garbage collected, or at capacity). Never blocks or throws.
   */
  send(message: Message<Topic, Content>): boolean;
}
