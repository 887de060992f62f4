// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Network error codes.
 *
 * Only API misuse is reported to callers. Delivery problems (unknown topic,
 * closed or full mailbox, uncloneable content) are logged at the publish site
 * and never surfaced to publishers.
 */
export type NetworkErrorCode =
  | "NETWORK_SEALED" // Builder used after build() handed its registry away
  | "SUBSCRIBER_CLOSED" // fetch()/drain() after close()
  | "INVALID_OPTIONS" // createNetwork() options failed validation
  | "UNCLONEABLE_CONTENT"; // default clone would drop the content's prototype

/**
 * Error thrown by setup-phase and subscriber operations on misuse.
 *
 * In contrast, `publish()` never throws.
 *
 * @example
 * ```typescript
 * try {
 *   subscriber.fetch();
 * } catch (err) {
 *   if (err instanceof NetworkError && err.code === "SUBSCRIBER_CLOSED") {
 *     // handle was released earlier
 *   }
 * }
 * ```
 */
export class NetworkError extends Error {
  /**
   * Canonical error code (UPPERCASE) for pattern matching.
   */
  readonly code: NetworkErrorCode;

  /**
   * Optional context (offending option name, value, etc.).
   */
  readonly details?: unknown;

  constructor(code: NetworkErrorCode, message?: string, details?: unknown) {
    super(message || code);
    this.code = code;
    this.details = details;
    this.name = "NetworkError";

    // Maintain proper stack trace for where our error was thrown (in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NetworkError);
    }
  }
}
