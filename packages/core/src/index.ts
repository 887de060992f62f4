// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @topicbus/core — In-process, topic-filtered publish/subscribe network
 *
 * Public API surface:
 * - createNetwork() → NetworkBuilder (setup phase: addSubscriber, build)
 * - Publisher → open phase (publish, clone, hasTopic, listTopics)
 * - Subscriber → per-subscriber mailbox (fetch, drain, close)
 * - SchemaNetworkBuilder → schema-typed networks (used by @topicbus/zod, @topicbus/valibot)
 */

// Network lifecycle
export { createNetwork, NetworkBuilder } from "./builder.js";
export { Publisher } from "./publisher.js";
export { Subscriber } from "./subscriber.js";
export type { Message, MailboxSender } from "./types.js";

// Building blocks
export { Mailbox } from "./mailbox.js";

// Options
export { normalizeOptions, structuredCopy } from "./options.js";
export type { NetworkOptions, ResolvedOptions } from "./options.js";

// Schema-typed networks
export {
  SchemaNetworkBuilder,
  SchemaPublisher,
  SchemaSubscriber,
} from "./schema.js";
export type {
  ContentValidator,
  SchemaMessage,
  ValidationOutcome,
} from "./schema.js";

// Errors
export { NetworkError } from "./error.js";
export type { NetworkErrorCode } from "./error.js";

// Logging
export { createLogger } from "./logger.js";
export type { LoggerAdapter, LoggerOptions, LogLevel } from "./logger.js";

// Constants
export { DEFAULTS, LOG_CONTEXT } from "./constants.js";
export type { LogContext } from "./constants.js";
