import { describe, it, expect } from "vitest";
import { loadClientConfig } from "../../src/config/ClientConfig.js";
import { ConfigError } from "../../src/core/errors.js";

describe("loadClientConfig", () => {
  it("returns key and endpoint from the environment", () => {
    const config = loadClientConfig({
      OPENAI_API_KEY: "test-secret",
      OPENAI_BASE_URL: "https://api.example.test/v1",
      UNRELATED: "x",
    });
    expect(config).toEqual({ apiKey: "test-secret", baseUrl: "https://api.example.test/v1" });
  });

  it("names the missing API key and where to get one", () => {
    expect(() => loadClientConfig({ OPENAI_BASE_URL: "https://api.example.test/v1" })).toThrow(
      "OPENAI_API_KEY is required. Set it in .env file or as environment variable.\n" +
        "See: https://docs.aws.amazon.com/bedrock/latest/userguide/api-keys.html",
    );
  });

  it("names the missing base URL with an example", () => {
    expect(() => loadClientConfig({ OPENAI_API_KEY: "test-secret" })).toThrow(
      "OPENAI_BASE_URL is required. Set it in .env file or as environment variable.\n" +
        "Example: https://bedrock-mantle.us-east-1.api.aws/v1",
    );
  });

  it("treats empty values as missing and checks the key first", () => {
    let caught: unknown;
    try {
      loadClientConfig({ OPENAI_API_KEY: "", OPENAI_BASE_URL: "" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ exitCode: 1 });
    expect(String(caught)).toContain("OPENAI_API_KEY is required");
  });
});
