import { describe, expect, it } from "vitest";
import { JSON_INSTRUCTION, translateRequest, type ProviderCallRequest } from "./llm-request";

function googleRequest(overrides: Partial<ProviderCallRequest> = {}): ProviderCallRequest {
  return {
    provider: "google",
    model: "gemini-1.5-pro-latest",
    prompt: "List three colors",
    systemMessage: undefined,
    temperature: 0.5,
    maxTokens: 256,
    enableWebSearch: false,
    requestJsonOutput: false,
    ...overrides,
  };
}

function openaiRequest(overrides: Partial<ProviderCallRequest> = {}): ProviderCallRequest {
  return googleRequest({ provider: "openai", model: "gpt-3.5-turbo", ...overrides });
}

describe("translateRequest — Google Gemini", () => {
  it("puts the model and key in the URL and sends no auth header", () => {
    const outbound = translateRequest(googleRequest(), "test-key");

    expect(outbound.url).toBe(
      "https://generativelanguage.googleapis.com/v1beta/models/gemini-1.5-pro-latest:generateContent?key=test-key",
    );
    expect(outbound.headers).toEqual({ "Content-Type": "application/json" });
    expect(outbound.body).toEqual({
      contents: [{ role: "user", parts: [{ text: "List three colors" }] }],
      generationConfig: { temperature: 0.5, maxOutputTokens: 256 },
    });
  });

  it("folds the system message into the user text", () => {
    const outbound = translateRequest(googleRequest({ systemMessage: "You are terse." }), "test-key");

    expect(outbound.body).toEqual({
      contents: [{ role: "user", parts: [{ text: "You are terse.\n\nUser Query: List three colors" }] }],
      generationConfig: { temperature: 0.5, maxOutputTokens: 256 },
    });
  });

  it("enables JSON mode on gemini-1.5 models and appends the instruction", () => {
    const outbound = translateRequest(googleRequest({ requestJsonOutput: true }), "test-key");

    expect(outbound.body).toEqual({
      contents: [{ role: "user", parts: [{ text: `List three colors${JSON_INSTRUCTION}` }] }],
      generationConfig: { temperature: 0.5, maxOutputTokens: 256, responseMimeType: "application/json" },
    });
  });

  it("does not append the instruction when the prompt already mentions JSON", () => {
    const outbound = translateRequest(
      googleRequest({ prompt: "Return a Json array of colors", requestJsonOutput: true }),
      "test-key",
    );

    expect(outbound.body).toEqual({
      contents: [{ role: "user", parts: [{ text: "Return a Json array of colors" }] }],
      generationConfig: { temperature: 0.5, maxOutputTokens: 256, responseMimeType: "application/json" },
    });
  });

  it("does not append the instruction when the system message mentions JSON", () => {
    const outbound = translateRequest(
      googleRequest({ systemMessage: "Answer in JSON.", requestJsonOutput: true }),
      "test-key",
    );

    expect(outbound.body).toEqual({
      contents: [{ role: "user", parts: [{ text: "Answer in JSON.\n\nUser Query: List three colors" }] }],
      generationConfig: { temperature: 0.5, maxOutputTokens: 256, responseMimeType: "application/json" },
    });
  });

  it("ignores JSON mode on models outside gemini-1.5", () => {
    const outbound = translateRequest(
      googleRequest({ model: "gemini-1.0-pro", requestJsonOutput: true }),
      "test-key",
    );

    expect(outbound.body).toEqual({
      contents: [{ role: "user", parts: [{ text: "List three colors" }] }],
      generationConfig: { temperature: 0.5, maxOutputTokens: 256 },
    });
  });

  it("attaches the search retrieval tool when web search is on", () => {
    const outbound = translateRequest(googleRequest({ enableWebSearch: true }), "test-key");

    expect(outbound.body).toEqual({
      contents: [{ role: "user", parts: [{ text: "List three colors" }] }],
      generationConfig: { temperature: 0.5, maxOutputTokens: 256 },
      tools: [{ googleSearchRetrieval: {} }],
    });
  });

  it("uses a configured base URL", () => {
    const outbound = translateRequest(googleRequest(), "test-key", {
      google: "http://localhost:9000",
      openai: "http://localhost:9001",
    });

    expect(outbound.url).toBe("http://localhost:9000/v1beta/models/gemini-1.5-pro-latest:generateContent?key=test-key");
  });
});

describe("translateRequest — OpenAI", () => {
  it("sends bearer auth to the chat completions endpoint", () => {
    const outbound = translateRequest(openaiRequest(), "test-key");

    expect(outbound.url).toBe("https://api.openai.com/v1/chat/completions");
    expect(outbound.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-key",
    });
    expect(outbound.body).toEqual({
      model: "gpt-3.5-turbo",
      messages: [{ role: "user", content: "List three colors" }],
      temperature: 0.5,
      max_tokens: 256,
    });
  });

  it("sends the system message as its own leading message and leaves the prompt untouched", () => {
    const outbound = translateRequest(openaiRequest({ systemMessage: "You are terse." }), "test-key");

    expect(outbound.body).toEqual({
      model: "gpt-3.5-turbo",
      messages: [
        { role: "system", content: "You are terse." },
        { role: "user", content: "List three colors" },
      ],
      temperature: 0.5,
      max_tokens: 256,
    });
  });

  it("enables JSON mode on any model and appends the instruction to the last message", () => {
    const outbound = translateRequest(
      openaiRequest({ model: "gpt-4", systemMessage: "You are terse.", requestJsonOutput: true }),
      "test-key",
    );

    expect(outbound.body).toEqual({
      model: "gpt-4",
      messages: [
        { role: "system", content: "You are terse." },
        { role: "user", content: `List three colors${JSON_INSTRUCTION}` },
      ],
      temperature: 0.5,
      max_tokens: 256,
      response_format: { type: "json_object" },
    });
  });

  it("does not append the instruction when the system message mentions JSON", () => {
    const outbound = translateRequest(
      openaiRequest({ systemMessage: "Reply with a JSON object.", requestJsonOutput: true }),
      "test-key",
    );

    expect(outbound.body).toEqual({
      model: "gpt-3.5-turbo",
      messages: [
        { role: "system", content: "Reply with a JSON object." },
        { role: "user", content: "List three colors" },
      ],
      temperature: 0.5,
      max_tokens: 256,
      response_format: { type: "json_object" },
    });
  });

  it("ignores the web search flag", () => {
    const outbound = translateRequest(openaiRequest({ enableWebSearch: true }), "test-key");

    expect(outbound.body).toEqual({
      model: "gpt-3.5-turbo",
      messages: [{ role: "user", content: "List three colors" }],
      temperature: 0.5,
      max_tokens: 256,
    });
  });
});
