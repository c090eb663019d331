import { generateText } from "ai";
import { describe, expect, it, vi } from "vitest";

import { ServiceUnavailableError, TransientServiceError } from "../../../domain/errors.js";
import { statusError } from "../../../test/fakes.js";
import { classifyGenerationFailure } from "../failureClassifier.js";
import { GatewayTextGenerationService, toServiceError, type TextGenerationRequest } from "../textGenerationService.js";

vi.mock("ai", async (importOriginal) => {
  const actual = await importOriginal<typeof import("ai")>();
  return {
    ...actual,
    createGateway: vi.fn(() => (modelId: string) => modelId),
    generateText: vi.fn()
  };
});

const request: TextGenerationRequest = {
  model: "model-a",
  prompt: "Summarize the lecture.",
  temperature: 0.3,
  maxOutputTokens: 100
};

describe("toServiceError", () => {
  it("tags overload and missing-model failures with the model", () => {
    const transient = toServiceError("model-a", statusError("Service busy", 503));
    const unavailable = toServiceError("model-b", new Error("404 model not found"));

    expect(transient).toBeInstanceOf(TransientServiceError);
    expect(transient).toMatchObject({ model: "model-a", message: "Service busy" });
    expect(unavailable).toBeInstanceOf(ServiceUnavailableError);
    expect(unavailable).toMatchObject({ model: "model-b", message: "404 model not found" });
  });

  it("passes other failures through unchanged", () => {
    const original = new Error("invalid api key");
    expect(toServiceError("model-a", original)).toBe(original);
  });
});

describe("GatewayTextGenerationService", () => {
  it("raises a transient service error the retry loop recognizes", async () => {
    vi.mocked(generateText).mockRejectedValueOnce(statusError("Too many requests", 429));
    const service = new GatewayTextGenerationService("test-secret", 1000);

    const error = await service.complete(request).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransientServiceError);
    expect(classifyGenerationFailure(error)).toBe("transient");
  });

  it("raises a service unavailable error for a missing model", async () => {
    vi.mocked(generateText).mockRejectedValueOnce(statusError("No such model", 404));
    const service = new GatewayTextGenerationService("test-secret", 1000);

    await expect(service.complete(request)).rejects.toBeInstanceOf(ServiceUnavailableError);
  });
});
