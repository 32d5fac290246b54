import {
  ProviderError,
  ProviderErrorType,
  describeError,
  getStatusCode,
  isProviderError,
  toProviderError,
} from "../errors/provider-error";

describe("toProviderError", () => {
  it("should map a 404 response to NOT_FOUND", () => {
    const error = toProviderError({ statusCode: 404, message: "SecretNotFound" });

    expect(error.type).toBe(ProviderErrorType.NOT_FOUND);
    expect(error.message).toBe("SecretNotFound");
  });

  it("should pass other failures through as UPSTREAM with the message verbatim", () => {
    const original = new Error("Operation returned an invalid status code 'Forbidden'");
    const error = toProviderError(original);

    expect(error.type).toBe(ProviderErrorType.UPSTREAM);
    expect(error.message).toBe("Operation returned an invalid status code 'Forbidden'");
    expect(error.originalError).toBe(original);
  });

  it("should return a ProviderError unchanged", () => {
    const error = new ProviderError("bad id", ProviderErrorType.INVALID_IDENTIFIER);

    expect(toProviderError(error)).toBe(error);
  });

  it("should stringify values that are not errors", () => {
    const error = toProviderError("socket hang up");

    expect(error.message).toBe("socket hang up");
    expect(error.originalError).toBeUndefined();
  });

  it("should attach suggestions", () => {
    const error = toProviderError({ statusCode: 403, message: "Forbidden" }, ["check access policies"]);

    expect(error.suggestions).toEqual(["check access policies"]);
  });
});

describe("getStatusCode", () => {
  it("should read a numeric statusCode", () => {
    expect(getStatusCode({ statusCode: 409 })).toBe(409);
  });

  it("should ignore missing or non-numeric codes", () => {
    expect(getStatusCode(new Error("x"))).toBeUndefined();
    expect(getStatusCode({ statusCode: "404" })).toBeUndefined();
    expect(getStatusCode(null)).toBeUndefined();
  });
});

describe("describeError", () => {
  it("should return the message alone without suggestions", () => {
    expect(describeError(new ProviderError("boom", ProviderErrorType.UPSTREAM))).toBe("boom");
  });

  it("should append one suggestion per line", () => {
    const error = new ProviderError("not found", ProviderErrorType.NOT_FOUND, undefined, ["hint one", "hint two"]);

    expect(describeError(error)).toBe("not found\nhint one\nhint two");
  });
});

describe("isProviderError", () => {
  it("should distinguish provider errors from plain errors", () => {
    expect(isProviderError(new ProviderError("x", ProviderErrorType.UPSTREAM))).toBe(true);
    expect(isProviderError(new Error("x"))).toBe(false);
  });

  it("should name the error class", () => {
    expect(new ProviderError("x", ProviderErrorType.UPSTREAM).name).toBe("ProviderError");
  });
});
