import { describe, expect, it } from "vitest";
import type { JsonObject } from "@incident/shared";
import { resolveInputs, resolveTemplate, type ResolutionScope } from "../src/engine/inputs.js";
import { UnresolvedReferenceError } from "../src/errors.js";

function scope(outputs: Record<string, JsonObject> = {}, context: JsonObject = {}): ResolutionScope {
  return { context, outputs: new Map(Object.entries(outputs)), taskNames: new Set(["list", "snapshot"]) };
}

describe("resolveInputs", () => {
  it("keeps the type of a whole-string reference", () => {
    const resolved = resolveInputs(
      { ids: "{{list.output.ids}}", count: "{{list.output.count}}", flag: "{{dryRun}}" },
      scope({ list: { ids: ["f1", "f2"], count: 2 } }, { dryRun: false })
    );

    expect(resolved).toEqual({ ids: ["f1", "f2"], count: 2, flag: false });
  });

  it("interpolates references inside longer strings", () => {
    const resolved = resolveInputs(
      { note: "{{list.output.count}} filters for {{user.email}}: {{list.output.ids}}" },
      scope({ list: { ids: ["f1"], count: 1 } }, { user: { email: "bob@example.com" } })
    );

    expect(resolved).toEqual({ note: '1 filters for bob@example.com: ["f1"]' });
  });

  it("walks nested arrays and objects", () => {
    const resolved = resolveInputs(
      { targets: [{ id: "{{list.output.ids.1}}" }, "{{case_ref}}", 7, null] },
      scope({ list: { ids: ["f1", "f2"] } }, { case_ref: "IR-7" })
    );

    expect(resolved).toEqual({ targets: [{ id: "f2" }, "IR-7", 7, null] });
  });

  it("leaves the inputs untouched", () => {
    const inputs = { user: "{{user}}" };
    resolveInputs(inputs, scope({}, { user: "bob" }));

    expect(inputs).toEqual({ user: "{{user}}" });
  });

  it("throws for references that cannot be resolved", () => {
    expect(() => resolveInputs({ ids: "{{snapshot.output.artifact}}" }, scope())).toThrow(
      new UnresolvedReferenceError("snapshot.output.artifact")
    );
    expect(() => resolveInputs({ user: "hello {{user}}" }, scope())).toThrow("Unresolved reference '{{user}}'.");
  });

  it("reads task-shaped references that name no task from the context", () => {
    const resolved = resolveInputs({ value: "{{ticket.output.id}}" }, scope({}, { ticket: { output: { id: "T-1" } } }));

    expect(resolved).toEqual({ value: "T-1" });
  });
});

describe("resolveTemplate", () => {
  it("always produces a string", () => {
    expect(resolveTemplate("rotate:{{user}}:{{attempt}}", scope({}, { user: "bob", attempt: 2 }))).toBe("rotate:bob:2");
  });
});
