/**
 * Unit tests for machine configuration and the error classes it raises.
 */
import { describe, it, expect } from "vitest";
import {
  DEFAULT_MACHINE_NAME,
  isMachineError,
  MACHINE_ERROR_CODES,
  MachineConfigError,
  MachineError,
  resolveMachineConfig,
} from "../../src/index.js";

describe("resolveMachineConfig", () => {
  it("should apply defaults", () => {
    expect(resolveMachineConfig()).toEqual({ name: DEFAULT_MACHINE_NAME, logLevel: "INFO" });
    expect(resolveMachineConfig({ name: "door" })).toEqual({ name: "door", logLevel: "INFO" });
  });

  it("should trim the name", () => {
    expect(resolveMachineConfig({ name: "  door  ", logLevel: "DEBUG" })).toEqual({
      name: "door",
      logLevel: "DEBUG",
    });
  });

  it("should reject an empty name with the field path", () => {
    try {
      resolveMachineConfig({ name: "" });
      expect.fail("Should have thrown");
    } catch (error) {
      if (!(error instanceof MachineConfigError)) throw error;
      const configError = error;
      expect(configError.code).toBe("FSM_INVALID_CONFIG");
      expect(configError.issues).toEqual(["name: name must not be empty"]);
      expect(configError.message).toBe(
        "Invalid machine configuration: name: name must not be empty"
      );
    }
  });

  it("should reject an unknown log level", () => {
    try {
      resolveMachineConfig({ name: "door", logLevel: "LOUD" });
      expect.fail("Should have thrown");
    } catch (error) {
      if (!(error instanceof MachineConfigError)) throw error;
      const configError = error;
      expect(configError.issues).toHaveLength(1);
      expect(configError.issues[0]?.startsWith("logLevel: ")).toBe(true);
    }
  });
});

describe("MachineError", () => {
  it("should carry code, name and context", () => {
    const error = new MachineError(MACHINE_ERROR_CODES.REENTRANT_DISPATCH, "busy", {
      operation: "handle",
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("MachineError");
    expect(error.code).toBe("FSM_REENTRANT_DISPATCH");
    expect(error.context).toEqual({ operation: "handle" });
    expect(isMachineError(error)).toBe(true);
  });

  it("should omit context when none is given", () => {
    const error = new MachineError(MACHINE_ERROR_CODES.UNREACHABLE_VARIANT, "nope");

    expect(error.context).toBeUndefined();
  });

  it("should match codes with hasCode", () => {
    const error = new MachineConfigError(["name: required"]);

    expect(error.name).toBe("MachineConfigError");
    expect(error).toBeInstanceOf(MachineError);
    expect(MachineError.hasCode(error, MACHINE_ERROR_CODES.INVALID_CONFIG)).toBe(true);
    expect(MachineError.hasCode(error, MACHINE_ERROR_CODES.REENTRANT_DISPATCH)).toBe(false);
    expect(MachineError.hasCode(new Error("plain"), MACHINE_ERROR_CODES.INVALID_CONFIG)).toBe(false);
  });
});
