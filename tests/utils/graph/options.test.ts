/**
 * Tests for analysis options
 */

import { describe, it, expect } from "@jest/globals";
import {
  deepFreeze,
  isRecencyCascadeEnabled,
  resolveAnalysisOptions,
} from "../../../src/utils/graph/options.js";
import { ErrorCode, ValidationError } from "../../../src/utils/errors.js";

describe("resolveAnalysisOptions", () => {
  it("should fill in defaults", () => {
    const options = resolveAnalysisOptions();

    expect(options.minDegree).toBe(2);
    expect(options.recencyCascade).toBe("unset");
    expect(options.includeSingletonCommunities).toBe(true);
    expect(options.hits).toEqual({ maxIterations: 100, tolerance: 1e-8 });
    expect(options.labelPropagation.maxRounds).toBe(20);
    expect(options.recency).toEqual({
      windowDays: 30,
      hops: 2,
      stalenessDays: 7,
      freshWindowDays: 180,
      neighborSampleLimit: 5,
    });
  });

  it("should return a frozen value", () => {
    const options = resolveAnalysisOptions({ excludePatterns: ["drafts"] });

    expect(Object.isFrozen(options)).toBe(true);
    expect(Object.isFrozen(options.excludePatterns)).toBe(true);
  });

  it("should reject negative limits", () => {
    expect(() => resolveAnalysisOptions({ minDegree: -1 })).toThrow(ValidationError);
    try {
      resolveAnalysisOptions({ minDegree: -1 });
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.code).toBe(ErrorCode.VALIDATION_INVALID_OPTIONS);
        expect(error.field).toBe("minDegree");
      }
    }
  });
});

describe("isRecencyCascadeEnabled", () => {
  it("should treat unset as on", () => {
    expect(isRecencyCascadeEnabled("unset")).toBe(true);
    expect(isRecencyCascadeEnabled("on")).toBe(true);
    expect(isRecencyCascadeEnabled("off")).toBe(false);
  });
});

describe("deepFreeze", () => {
  it("should freeze nested objects and arrays", () => {
    const value = deepFreeze({ list: [{ n: 1 }] });

    expect(Object.isFrozen(value.list[0])).toBe(true);
  });
});
