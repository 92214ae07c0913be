import { describe, expect, it } from "vitest";
import { errorMessage, isConflict, isNotFound } from "../src/utils/errors.js";

describe("status helpers", () => {
  it("recognise Azure RestError status codes", () => {
    expect(isNotFound({ statusCode: 404 })).toBe(true);
    expect(isConflict({ statusCode: 409 })).toBe(true);
    expect(isNotFound({ statusCode: 500 })).toBe(false);
  });

  it("recognise Kubernetes ApiException codes", () => {
    expect(isNotFound({ code: 404 })).toBe(true);
    expect(isConflict({ code: 409 })).toBe(true);
  });

  it("read a nested response status", () => {
    expect(isNotFound({ response: { statusCode: 404 } })).toBe(true);
  });

  it("ignore string error codes and non-objects", () => {
    expect(isNotFound({ code: "ResourceNotFound" })).toBe(false);
    expect(isNotFound("404")).toBe(false);
    expect(isConflict(null)).toBe(false);
  });
});

describe("errorMessage", () => {
  it("uses the message of an Error and stringifies anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
  });
});
