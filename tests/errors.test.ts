import { describe, expect, it } from "vitest";
import { classifyUpstreamError } from "../src/errors.js";

describe("classifyUpstreamError", () => {
  it("recognises rejected credentials", () => {
    expect(classifyUpstreamError(401, "Unauthorized")).toBe("authentication");
    expect(classifyUpstreamError(200, "Auth token expired")).toBe("authentication");
    expect(classifyUpstreamError(200, "Authorization required")).toBe("authentication");
  });

  it("does not read author as auth", () => {
    expect(classifyUpstreamError(200, "Author not found")).toBe("invalid-input");
  });

  it("sorts credit, premium and input failures", () => {
    expect(classifyUpstreamError(200, "Insufficient balance")).toBe("insufficient-credits");
    expect(classifyUpstreamError(200, "Premium account required")).toBe("premium-required");
    expect(classifyUpstreamError(200, "Invalid list_id")).toBe("invalid-input");
    expect(classifyUpstreamError(200, "Something odd")).toBe("unknown");
  });
});
