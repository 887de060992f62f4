// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Network options: content cloning, mailbox capacity, logging.
 * Passed to createNetwork({ clone, mailboxCapacity, logger }).
 *
 * Behavior:
 * - Options apply to every subscriber of the network
 * - Validated once, at createNetwork() time
 * - Topology (the topic lists given to addSubscriber) is the only other configuration
 */

import { DEFAULTS } from "./constants.js";
import { NetworkError } from "./error.js";
import { createLogger, type LoggerAdapter } from "./logger.js";

export interface NetworkOptions<Content> {
  /**
   * Produces each subscriber's copy of published content.
   * Default: structuredClone, refusing class instances (whose prototype
   * structuredClone would drop). Pass a custom clone for those.
   */
  clone?: (content: Content) => Content;

  /**
   * Maximum queued messages per mailbox. Overflow is dropped, never blocks.
   * Default: Infinity (unbounded)
   */
  mailboxCapacity?: number;

  /**
   * Default: createLogger({ minLevel: "warn" })
   */
  logger?: LoggerAdapter;
}

export interface ResolvedOptions<Content> {
  clone: (content: Content) => Content;
  mailboxCapacity: number;
  logger: LoggerAdapter;
}

export function normalizeOptions<Content>(
  options: NetworkOptions<Content> = {},
): ResolvedOptions<Content> {
  const { clone, mailboxCapacity = DEFAULTS.MAILBOX_CAPACITY, logger } = options;

  if (clone !== undefined && typeof clone !== "function") {
    throw new NetworkError("INVALID_OPTIONS", "clone must be a function", {
      option: "clone",
    });
  }

  if (
    mailboxCapacity !== Infinity &&
    !(Number.isInteger(mailboxCapacity) && mailboxCapacity > 0)
  ) {
    throw new NetworkError(
      "INVALID_OPTIONS",
      `mailboxCapacity must be a positive integer or Infinity, got ${String(mailboxCapacity)}`,
      { option: "mailboxCapacity", value: mailboxCapacity },
    );
  }

  return {
    clone: clone ?? structuredCopy,
    mailboxCapacity,
    logger: logger ?? createLogger(),
  };
}

/**
 * structuredClone that refuses to hand out a plain object in place of a class
 * instance, so every delivered copy keeps the published value's type.
 *
 * @throws {NetworkError} UNCLONEABLE_CONTENT when the copy lost its prototype
 */
export function structuredCopy<Content>(content: Content): Content {
  const copy = structuredClone(content);
  if (typeof content !== "object" || content === null) return copy;

  const prototype: unknown = Object.getPrototypeOf(content);
  if (prototype !== null && Object.getPrototypeOf(copy) !== prototype) {
    throw new NetworkError(
      "UNCLONEABLE_CONTENT",
      "structuredClone does not preserve this content's prototype; pass a clone option",
      { type: Object.prototype.toString.call(content) },
    );
  }
  return copy;
}
