import { describe, expect, it } from "vitest";
import {
  AuthorizationError,
  IndexNotReadyError,
  RagError,
  TimeoutError,
  describeError,
  isAuthorizationFailure,
} from "../src/errors";
import { OpenAICompletions, OpenAIEmbeddings } from "../src/openai";
import { StatusManager } from "../src/status";

describe("errors", () => {
  it("recognises credential failures by class or HTTP status", () => {
    expect(isAuthorizationFailure(new AuthorizationError("nope"))).toBe(true);
    expect(isAuthorizationFailure(Object.assign(new Error("x"), { status: 401 }))).toBe(true);
    expect(isAuthorizationFailure({ statusCode: 403 })).toBe(true);
    expect(isAuthorizationFailure(Object.assign(new Error("x"), { status: 500 }))).toBe(false);
    expect(isAuthorizationFailure("401")).toBe(false);
  });

  it("names every error class", () => {
    const err = new IndexNotReadyError();
    expect(err).toBeInstanceOf(RagError);
    expect(describeError(err)).toBe("IndexNotReadyError: Index does not exist yet. Run an ingestion pass first.");
    expect(describeError(new TimeoutError("search", 7000))).toBe("TimeoutError: search timed out after 7000ms");
    expect(describeError("plain")).toBe("plain");
  });

  it("refuses to build OpenAI clients without a key", () => {
    expect(() => new OpenAICompletions({ apiKey: "" }, "gpt-4o-mini")).toThrow(AuthorizationError);
    expect(() => new OpenAIEmbeddings({ apiKey: "" }, "text-embedding-3-small")).toThrow(AuthorizationError);
    expect(new OpenAIEmbeddings({ apiKey: "test-secret" }, "text-embedding-3-small").modelName).toBe(
      "text-embedding-3-small",
    );
  });
});

describe("StatusManager", () => {
  it("resets counters per run and tracks the pipeline state", () => {
    const status = new StatusManager({ version: "1.2.3" });
    status.beginRun();
    status.setState("embedding", "fs:/docs");
    status.inc("indexed");
    status.inc("chunksIndexed", 4);
    expect(status.getStatus()).toMatchObject({ version: "1.2.3", state: "embedding", currentSource: "fs:/docs" });
    status.endRun(false);
    expect(status.getStatus()).toMatchObject({ state: "idle", currentSource: null, lastRunCancelled: false });
    expect(status.getStatus().ingestion).toMatchObject({ indexed: 1, chunksIndexed: 4 });
    status.beginRun();
    expect(status.getStatus().ingestion.indexed).toBe(0);
  });
});
