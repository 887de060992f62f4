// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Type-level inference utilities for Valibot topic schemas.
 */

import type {
  SchemaMessage,
  SchemaNetworkBuilder,
  SchemaPublisher,
  SchemaSubscriber,
} from "@topicbus/core";
import type { GenericSchema, InferInput, InferOutput } from "valibot";

/**
 * Topic name → Valibot schema of the content published under it.
 */
export type TopicSchemas = Record<string, GenericSchema>;

export type TopicOf<S extends TopicSchemas> = Extract<keyof S, string>;

export type InferInputs<S extends TopicSchemas> = {
  [K in TopicOf<S>]: InferInput<S[K]>;
};

export type InferOutputs<S extends TopicSchemas> = {
  [K in TopicOf<S>]: InferOutput<S[K]>;
};

export type ValibotNetworkBuilder<S extends TopicSchemas> = SchemaNetworkBuilder<
  TopicOf<S>,
  InferInputs<S>,
  InferOutputs<S>,
  GenericSchema
>;

export type ValibotPublisher<S extends TopicSchemas> = SchemaPublisher<
  TopicOf<S>,
  InferInputs<S>,
  GenericSchema
>;

export type ValibotSubscriber<
  S extends TopicSchemas,
  K extends TopicOf<S> = TopicOf<S>,
> = SchemaSubscriber<InferOutputs<S>, K>;

export type InferMessage<
  S extends TopicSchemas,
  K extends TopicOf<S> = TopicOf<S>,
> = SchemaMessage<InferOutputs<S>, K>;
