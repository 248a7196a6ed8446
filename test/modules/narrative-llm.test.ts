import assert from "node:assert/strict";
import test from "node:test";

import {
  NarrativeRequestError,
  OpenAiNarrativeGenerator,
  composeEnhancedMessage,
  extractChoiceContent,
  parseNarrativeContent
} from "../../src/adapters/narrative-llm/index.js";
import type { NarrativeRequest } from "../../src/modules/alerting/types.js";

const request: NarrativeRequest = {
  crop: "rice",
  stage: "Flowering",
  village: "Kumhrar",
  district: "Patna",
  latitude: 25.596,
  longitude: 85.183,
  weather: { temperatureC: 28, windSpeedKmh: 12, precipitationForecastMm: 30 }
};

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { role: "assistant", content } }] }), {
    status: 200,
    headers: { "content-type": "application/json" }
  });
}

test("generates a narrative from a chat completion", async () => {
  const calls: Array<{ url: string; init: RequestInit | undefined }> = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    return completion(
      JSON.stringify({
        alert: "Heavy showers expected over three days",
        impact: "Flowers may drop in waterlogged fields",
        recommendations: "Clear field drains"
      })
    );
  };
  const generator = new OpenAiNarrativeGenerator({
    apiKey: "test-key",
    baseUrl: "https://llm.test/v1/",
    model: "gpt-4o-mini",
    requestTimeoutMs: 1_000,
    fetchImpl
  });

  const result = await generator.generate(request);

  assert.equal(generator.enabled, true);
  assert.deepEqual(result, {
    alert: "Heavy showers expected over three days",
    impact: "Flowers may drop in waterlogged fields",
    recommendations: "Clear field drains",
    enhancedMessage:
      "🤖 AI Weather Alert for Kumhrar, Patna: Heavy showers expected over three days " +
      "🌾 Crop Impact (rice - Flowering): Flowers may drop in waterlogged fields"
  });
  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.url, "https://llm.test/v1/chat/completions");
  assert.equal(calls[0]?.init?.method, "POST");
  assert.equal(new Headers(calls[0]?.init?.headers).get("authorization"), "Bearer test-key");
  const body = String(calls[0]?.init?.body);
  assert.match(body, /"model":"gpt-4o-mini"/);
  assert.match(body, /"temperature":0\.3/);
  assert.match(body, /"response_format":\{"type":"json_object"\}/);
});

test("a missing api key disables the generator", async () => {
  const generator = new OpenAiNarrativeGenerator({
    apiKey: "  ",
    baseUrl: "https://llm.test/v1",
    model: "gpt-4o-mini",
    requestTimeoutMs: 1_000
  });

  assert.equal(generator.enabled, false);
  await assert.rejects(generator.generate(request), {
    name: "NarrativeRequestError",
    message: "AI narrative is disabled: no API key configured"
  });
});

test("upstream failures carry the HTTP status", async () => {
  const generator = new OpenAiNarrativeGenerator({
    apiKey: "test-key",
    baseUrl: "https://llm.test/v1",
    model: "gpt-4o-mini",
    requestTimeoutMs: 1_000,
    fetchImpl: async () => new Response("rate limited", { status: 429 })
  });

  await assert.rejects(generator.generate(request), (error: unknown) => {
    assert.ok(error instanceof NarrativeRequestError);
    assert.equal(error.message, "LLM request failed with HTTP 429");
    assert.equal(error.status, 429);
    return true;
  });
});

test("slow completions time out with status 408", async () => {
  const generator = new OpenAiNarrativeGenerator({
    apiKey: "test-key",
    baseUrl: "https://llm.test/v1",
    model: "gpt-4o-mini",
    requestTimeoutMs: 20,
    fetchImpl: (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          reject(new DOMException("This operation was aborted", "AbortError"));
        });
      })
  });

  await assert.rejects(generator.generate(request), {
    name: "NarrativeRequestError",
    message: "LLM request timed out after 20ms",
    status: 408
  });
});

test("narrative content is read from fenced or embedded JSON", () => {
  assert.deepEqual(parseNarrativeContent('```json\n{"alert":"Hot spell","impact":"Wilting"}\n```'), {
    alert: "Hot spell",
    impact: "Wilting",
    recommendations: "Continue routine farming activities"
  });
  assert.deepEqual(parseNarrativeContent('Here you go: {"recommendations":"Irrigate at dusk"} thanks'), {
    alert: "Weather update for agricultural activities",
    impact: "Monitor crops regularly",
    recommendations: "Irrigate at dusk"
  });
  assert.throws(() => parseNarrativeContent("no json here"), {
    name: "NarrativeRequestError",
    message: "Unable to parse JSON from LLM response content"
  });
  assert.throws(() => parseNarrativeContent('"just text"'), /not an object/);
});

test("choice content may arrive as text parts or output_text", () => {
  assert.equal(
    extractChoiceContent({ choices: [{ message: { content: [{ text: "part one" }, { content: "part two" }] } }] }),
    "part one\npart two"
  );
  assert.equal(extractChoiceContent({ output_text: " plain " }), "plain");
  assert.throws(() => extractChoiceContent({ choices: [] }), /did not include text content/);
});

test("an empty impact leaves the crop impact sentence out", () => {
  const analysis = { alert: "Clear skies", impact: "N/A", recommendations: "Sow on time" };

  assert.equal(
    composeEnhancedMessage(analysis, request),
    "🤖 AI Weather Alert for Kumhrar, Patna: Clear skies"
  );
});
