/**
 * Service Error Tests
 *
 * @see packages/shared/src/errors/index.ts
 */

import { describe, it, expect } from "@jest/globals";
import {
  describeError,
  duplicateError,
  internalError,
  isServiceError,
  notFoundError,
  validationError,
} from "../src/index.js";

describe("Service Errors", () => {
  it("should omit the cause field when none is given", () => {
    expect(validationError("validator.validateURL", "URL too long")).toEqual({
      kind: "VALIDATION",
      op: "validator.validateURL",
      message: "URL too long",
    });
    expect("cause" in internalError("op", "message")).toBe(false);
  });

  it("should build each kind", () => {
    expect(duplicateError("op", "taken").kind).toBe("DUPLICATE");
    expect(notFoundError("op", "missing").kind).toBe("NOT_FOUND");
    expect(internalError("op", "broken", new Error("x")).kind).toBe("INTERNAL");
  });

  describe("describeError", () => {
    it("should render op and message", () => {
      expect(describeError(notFoundError("repository.getByCode", "short URL not found"))).toBe(
        "repository.getByCode: short URL not found"
      );
    });

    it("should render the whole cause chain", () => {
      const error = internalError(
        "service.createShortUrl",
        "failed to check code existence",
        internalError("repository.getByCode", "failed to lookup record", new Error("ECONNREFUSED"))
      );

      expect(describeError(error)).toBe(
        "service.createShortUrl: failed to check code existence: " +
          "repository.getByCode: failed to lookup record: ECONNREFUSED"
      );
    });

    it("should stringify non-error causes", () => {
      expect(describeError(internalError("op", "bad status", 503))).toBe("op: bad status: 503");
    });
  });

  describe("isServiceError", () => {
    it("should recognise service errors only", () => {
      expect(isServiceError(duplicateError("op", "taken"))).toBe(true);
      expect(isServiceError(new Error("plain"))).toBe(false);
      expect(isServiceError(null)).toBe(false);
    });
  });
});
