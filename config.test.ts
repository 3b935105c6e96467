/// <reference types="node" />
/**
 * Tests environment configuration loading.
 *
 * Key coverage:
 * - Missing API key fails at startup, not per request.
 * - Defaults and the TUTOR_MODELS override.
 */

import assert from "node:assert";
import test from "node:test";
import { DEFAULT_BASE_URL, DEFAULT_MODELS, loadConfig } from "./config";
import { ConfigurationError } from "./models/errors";

test("loadConfig rejects a missing API key", () => {
  assert.throws(() => loadConfig({}), ConfigurationError);
  assert.throws(() => loadConfig({ OPENROUTER_API_KEY: "   " }), /Missing OPENROUTER_API_KEY/);
});

test("loadConfig applies defaults", () => {
  const config = loadConfig({ OPENROUTER_API_KEY: "test-key" });
  assert.strictEqual(config.apiKey, "test-key");
  assert.strictEqual(config.baseURL, DEFAULT_BASE_URL);
  assert.strictEqual(config.port, 5000);
  assert.strictEqual(config.host, "localhost");
  assert.deepStrictEqual(config.models, [
    "anthropic/claude-3-haiku",
    "anthropic/claude-3-sonnet",
    "openai/gpt-3.5-turbo",
    "google/gemini-pro",
  ]);
  assert.strictEqual(config.models, DEFAULT_MODELS);
});

test("loadConfig reads overrides", () => {
  const config = loadConfig({
    OPENROUTER_API_KEY: "test-key",
    OPENROUTER_BASE_URL: "http://localhost:8080/v1",
    PORT: "3001",
    HOST: "0.0.0.0",
    TUTOR_MODELS: "model-a, model-b,,model-c ",
  });
  assert.strictEqual(config.baseURL, "http://localhost:8080/v1");
  assert.strictEqual(config.port, 3001);
  assert.strictEqual(config.host, "0.0.0.0");
  assert.deepStrictEqual(config.models, ["model-a", "model-b", "model-c"]);
});

test("loadConfig rejects an empty model list and a bad port", () => {
  assert.throws(
    () => loadConfig({ OPENROUTER_API_KEY: "test-key", TUTOR_MODELS: " , " }),
    /TUTOR_MODELS must name at least one model/
  );
  assert.throws(() => loadConfig({ OPENROUTER_API_KEY: "test-key", PORT: "abc" }), /Invalid PORT: abc/);
  assert.throws(() => loadConfig({ OPENROUTER_API_KEY: "test-key", PORT: "70000" }), ConfigurationError);
});
