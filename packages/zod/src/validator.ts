// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { ContentValidator } from "@topicbus/core";
import { z } from "zod";

/**
 * Validator adapter that bridges Zod with schema-typed networks.
 *
 * Rejections carry Zod's issues plus a prettified summary for logs.
 */
export function zodValidator(): ContentValidator<z.ZodType> {
  return {
    validate(schema, content) {
      const result = schema.safeParse(content);
      if (result.success) {
        return { ok: true, value: result.data };
      }
      return {
        ok: false,
        issues: result.error.issues,
        message: z.prettifyError(result.error),
      };
    },
  };
}
