import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { ConfigError, handleError, PromptPathError } from "../source/errors.ts";

describe("handleError", () => {
  it("prints project errors by name", () => {
    const lines: string[] = [];
    handleError(new ConfigError("/tmp/cfg.json", "bad value"), (line) =>
      lines.push(line),
    );
    assert.deepEqual(lines, ["ConfigError: /tmp/cfg.json: bad value"]);
  });

  it("prints unexpected errors with their stack", () => {
    const lines: string[] = [];
    const error = new Error("boom");
    handleError(error, (line) => lines.push(line));
    assert.equal(lines[0], "Unexpected error: boom");
    assert.equal(lines[1], error.stack);
  });

  it("prints non-error values", () => {
    const lines: string[] = [];
    handleError("nope", (line) => lines.push(line));
    assert.deepEqual(lines, ["Unexpected error: nope"]);
  });
});

describe("PromptPathError", () => {
  it("keeps its cause", () => {
    const cause = new Error("inner");
    const error = new PromptPathError("outer", { cause });
    assert.equal(error.name, "PromptPathError");
    assert.equal(error.cause, cause);
  });
});
