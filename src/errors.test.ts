import { describe, it, expect } from "vitest";
import { CameraBusy, FatalDriverError, IsocamError, MalformedMessage, ProtocolError, errorFromKind } from "./errors";

describe("errors", () => {
  it("rebuilds the class named by a reported kind", () => {
    const error = errorFromKind("CameraBusy", "Camera 05761 is already open");

    expect(error).toBeInstanceOf(CameraBusy);
    expect(error.kind).toBe("CameraBusy");
    expect(error.name).toBe("CameraBusy");
    expect(error.message).toBe("Camera 05761 is already open");
    expect(errorFromKind("FatalDriverError", "gone")).toBeInstanceOf(FatalDriverError);
  });

  it("keeps unknown kinds as generic errors", () => {
    const error = errorFromKind("ThermalShutdown", "too hot");

    expect(error).toBeInstanceOf(IsocamError);
    expect(error.kind).toBe("ThermalShutdown");
    expect(errorFromKind("toString", "x").constructor).toBe(IsocamError);
  });

  it("treats malformed messages as protocol errors", () => {
    expect(new MalformedMessage("bad")).toBeInstanceOf(ProtocolError);
    expect(new MalformedMessage("bad").kind).toBe("MalformedMessage");
  });
});
