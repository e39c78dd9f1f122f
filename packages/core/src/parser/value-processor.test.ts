import { describe, it, expect } from "vitest";
import { ValidationError, multipleValues, singleValue } from "@argsmith/sdk";
import { createArg } from "../descriptors/arg.js";
import { createMatchState } from "../matches/index.js";
import { checkValue, processValue } from "./value-processor.js";

describe("checkValue", () => {
  it("rejects values outside the allowed set", () => {
    const arg = createArg("level").possibleValues(["debug", "info"]).build();
    expect(() => checkValue(arg, "loud")).toThrow(
      "error: validation failed for 'level': invalid value 'loud', expected one of: debug, info",
    );
  });

  it("runs the custom validator after the allowed set", () => {
    const arg = createArg("port")
      .validator((value) => (/^\d+$/.test(value) ? undefined : "must be a number"))
      .build();
    expect(() => checkValue(arg, "8080")).not.toThrow();
    try {
      checkValue(arg, "http");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.argName).toBe("port");
        expect(err.detail).toBe("must be a number");
        expect(err.value).toBe("http");
      }
    }
  });
});

describe("processValue", () => {
  it("overwrites single values", () => {
    const arg = createArg("name").build();
    const state = createMatchState("app");
    processValue(state, arg, "first");
    processValue(state, arg, "second");
    expect(state.values.get("name")).toEqual(singleValue("second"));
  });

  it("appends multiple values", () => {
    const arg = createArg("include").multiple().build();
    const state = createMatchState("app");
    processValue(state, arg, "a");
    processValue(state, arg, "b");
    expect(state.values.get("include")).toEqual(multipleValues(["a", "b"]));
  });

  it("starts a new list when the stored value is not a list", () => {
    const arg = createArg("include").multiple().build();
    const state = createMatchState("app");
    state.values.set("include", singleValue("default"));
    processValue(state, arg, "a");
    expect(state.values.get("include")).toEqual(multipleValues(["a"]));
  });

  it("splits, trims and replaces delimited values", () => {
    const arg = createArg("tags").valueDelimiter(",").build();
    const state = createMatchState("app");
    processValue(state, arg, "old");
    processValue(state, arg, "rust, cli , tool");
    expect(state.values.get("tags")).toEqual(multipleValues(["rust", "cli", "tool"]));
  });

  it("appends delimited pieces when asked to", () => {
    const arg = createArg("tags").valueDelimiter(",").build();
    const state = createMatchState("app");
    processValue(state, arg, "a,b");
    processValue(state, arg, "c", { append: true });
    expect(state.values.get("tags")).toEqual(multipleValues(["a", "b", "c"]));
  });

  it("checks each delimited piece and stores nothing on failure", () => {
    const arg = createArg("mode").valueDelimiter(",").possibleValues(["a", "b"]).build();
    const state = createMatchState("app");
    expect(() => processValue(state, arg, "a, c")).toThrow(
      "error: validation failed for 'mode': invalid value 'c', expected one of: a, b",
    );
    expect(state.values.has("mode")).toBe(false);
  });
});
