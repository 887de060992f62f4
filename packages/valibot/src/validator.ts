// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { ContentValidator } from "@topicbus/core";
import * as v from "valibot";

/**
 * Validator adapter that bridges Valibot with schema-typed networks.
 */
export function valibotValidator(): ContentValidator<v.GenericSchema> {
  return {
    validate(schema, content) {
      const result = v.safeParse(schema, content);
      if (result.success) {
        return { ok: true, value: result.output };
      }
      return {
        ok: false,
        issues: result.issues,
        message: v.summarize(result.issues),
      };
    },
  };
}
