// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it, vi } from "vitest";
import { NetworkError } from "./error.js";
import { createLogger } from "./logger.js";
import { normalizeOptions, structuredCopy } from "./options.js";

describe("normalizeOptions", () => {
  it("applies defaults", () => {
    const options = normalizeOptions<{ n: number }>();

    expect(options.mailboxCapacity).toBe(Infinity);
    expect(typeof options.logger.warn).toBe("function");

    const original = { n: 1 };
    const copy = options.clone(original);
    expect(copy).toEqual(original);
    expect(copy).not.toBe(original);
  });

  it("keeps provided values", () => {
    const clone = vi.fn((n: number) => n);
    const logger = createLogger({ log: vi.fn() });

    const options = normalizeOptions({ clone, mailboxCapacity: 8, logger });

    expect(options.clone).toBe(clone);
    expect(options.mailboxCapacity).toBe(8);
    expect(options.logger).toBe(logger);
  });

  it.each([0, -1, 1.5, Number.NaN])(
    "rejects mailboxCapacity %s",
    (mailboxCapacity) => {
      expect(() => normalizeOptions({ mailboxCapacity })).toThrow(NetworkError);

      try {
        normalizeOptions({ mailboxCapacity });
      } catch (err) {
        expect(err).toBeInstanceOf(NetworkError);
        if (err instanceof NetworkError) {
          expect(err.code).toBe("INVALID_OPTIONS");
          expect(err.details).toEqual({
            option: "mailboxCapacity",
            value: mailboxCapacity,
          });
        }
      }
    },
  );

  it("rejects a non-function clone", () => {
    // Untyped input, as from a JavaScript caller
    const options = JSON.parse('{ "clone": "deep" }');

    expect(() => normalizeOptions(options)).toThrow(
      "clone must be a function",
    );
  });
});

describe("structuredCopy", () => {
  class Point {
    constructor(readonly x: number) {}
  }

  it("copies plain data, arrays, dates and maps", () => {
    const content = {
      tags: ["a", "b"],
      at: new Date(0),
      index: new Map([["k", 1]]),
    };

    const copy = structuredCopy(content);

    expect(copy).toEqual(content);
    expect(copy).not.toBe(content);
    expect(copy.at).toBeInstanceOf(Date);
    expect(copy.index).toBeInstanceOf(Map);
  });

  it("passes primitives and null-prototype records through", () => {
    const record: Record<string, number> = Object.create(null);
    record.n = 1;

    expect(structuredCopy("text")).toBe("text");
    expect(structuredCopy(null)).toBeNull();
    expect(structuredCopy(record)).toEqual({ n: 1 });
  });

  it("refuses class instances", () => {
    try {
      structuredCopy(new Point(1));
      expect.unreachable("class instance was copied");
    } catch (err) {
      expect(err).toBeInstanceOf(NetworkError);
      if (err instanceof NetworkError) {
        expect(err.code).toBe("UNCLONEABLE_CONTENT");
        expect(err.details).toEqual({ type: "[object Object]" });
      }
    }
  });
});
