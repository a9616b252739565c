import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { LogLevel } from "../types/log-level.js";
import { createLogMessage } from "../types/log-message.js";
import { renderTemplate } from "./formatter.js";

const T = new Date(2024, 0, 1, 12, 0, 0).getTime();

describe("renderTemplate property tests", () => {
  it("renders any message text verbatim through {m}", () => {
    fc.assert(
      fc.property(fc.string(), (text) => {
        const msg = createLogMessage(LogLevel.Info, text, "p.ts", 1, T);
        expect(renderTemplate("<{m}>", msg)).toBe(`<${text}>`);
      }),
    );
  });

  it("leaves templates without placeholders unchanged", () => {
    fc.assert(
      fc.property(
        fc.string().filter((tpl) => !/\{[tLflm]\}/.test(tpl)),
        (tpl) => {
          const msg = createLogMessage(LogLevel.Info, "m", "p.ts", 1, T);
          expect(renderTemplate(tpl, msg)).toBe(tpl);
        },
      ),
    );
  });
});
