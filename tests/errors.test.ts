import { describe, it, expect } from "vitest";
import { ConfigError, ProviderError, formatCliError } from "../src/core/errors.js";

describe("errors", () => {
    it("keeps the cause and the class name", () => {
        const inner = new Error("socket closed");
        const err = new ProviderError("gemini failed", { provider: "gemini", retryable: true, cause: inner });
        expect(err.name).toBe("ProviderError");
        expect(err.cause).toBe(inner);
        expect(err.retryable).toBe(true);
        expect(new ConfigError("bad").cause).toBeUndefined();
    });

    it("formats a CLI error with its hint", () => {
        expect(formatCliError("generate", " no model provider is configured ", "set GOOGLE_API_KEY"))
            .toBe("[symphony generate] no model provider is configured Hint: set GOOGLE_API_KEY");
        expect(formatCliError("status", "no runs yet")).toBe("[symphony status] no runs yet");
    });
});
