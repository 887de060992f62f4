// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @topicbus/valibot - Valibot-typed topics for topicbus networks
 *
 * @example
 * ```typescript
 * import { v, createSchemaNetwork } from "@topicbus/valibot";
 *
 * const builder = createSchemaNetwork({ ping: v.object({ at: v.number() }) });
 * ```
 */

// Canonical Valibot instance (single import source)
export * as v from "valibot";

export { createSchemaNetwork } from "./network.js";
export { valibotValidator } from "./validator.js";

export type {
  InferInputs,
  InferMessage,
  InferOutputs,
  TopicOf,
  TopicSchemas,
  ValibotNetworkBuilder,
  ValibotPublisher,
  ValibotSubscriber,
} from "./types.js";
