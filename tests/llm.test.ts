/**
 * Tests for the provider client, SDK back ends and response parsing.
 */

import {
  AnthropicBackend,
  BackendProviderClient,
  Completion,
  CompletionRequest,
  OpenAICompatibleBackend,
  ProviderBackend,
  attemptJsonRepair,
  buildAnalysisPrompt,
  classifyErrorKind,
  classifyProviderError,
  createProviderClient,
  parseProviderResponse,
  requestRemoteAnalysis,
  validateBaseUrl,
} from "../src/integrations/llm";
import { buildUserMessage } from "../src/integrations/llm/client";
import { GOOGLE_OPENAI_BASE_URL } from "../src/integrations/llm/types";
import { ConfigurationInvalidError, ProviderTimeoutError } from "../src/errors";

// Mock the SDK modules
jest.mock("openai");
jest.mock("@anthropic-ai/sdk");

const PROMPT = { systemPrompt: "system", userPrompt: "Review this script." };

function fakeBackend(complete: (request: CompletionRequest, signal: AbortSignal) => Promise<Completion>): ProviderBackend {
  return { name: "openai", complete };
}

// ============================================================================
// Response parsing
// ============================================================================

describe("attemptJsonRepair", () => {
  it("should cut after the last complete array element", () => {
    const truncated =
      '{"summary":"x","performance_optimizations":[{"issue":"A","original_code":"a"},{"issue":"B","orig';

    expect(attemptJsonRepair(truncated)).toBe(
      '{"summary":"x","performance_optimizations":[{"issue":"A","original_code":"a"}]}'
    );
  });

  it("should repair truncated string arrays", () => {
    expect(attemptJsonRepair('{"general_suggestions":["one","tw')).toBe('{"general_suggestions":["one"]}');
  });

  it("should return null when there is nothing to repair", () => {
    expect(attemptJsonRepair('{"summary":"done"}')).toBeNull();
    expect(attemptJsonRepair("no json here")).toBeNull();
    expect(attemptJsonRepair('{"summary":"cut')).toBeNull();
  });
});

describe("parseProviderResponse", () => {
  const redacted = "for word in words:\n    stim = visual.TextStim(win, text=word)\n    stim.draw()\n";

  it("should map sections to findings attributed to the provider", () => {
    const raw =
      "Here you go:\n" +
      JSON.stringify({
        summary: "Shows words",
        performance_optimizations: [
          {
            issue: "Stimulus rebuilt each trial",
            original_code: "stim = visual.TextStim(win, text=word)",
            improved_code: "stim.text = word",
            explanation: "Creating stimuli is slow",
          },
        ],
        general_suggestions: ["Use a conditions file"],
      });
    const parsed = parseProviderResponse(raw, "openai", redacted);

    expect(parsed).toEqual({
      ok: true,
      summary: "Shows words",
      findings: [
        {
          ruleId: "REMOTE_PERFORMANCE",
          category: "PERFORMANCE",
          severity: "WARN",
          title: "Stimulus rebuilt each trial",
          explanation: "Creating stimuli is slow",
          excerpt: "stim = visual.TextStim(win, text=word)",
          replacement: "stim.text = word",
          line: 2,
          endLine: 2,
          source: "REMOTE_OPENAI",
          meta: false,
        },
        {
          ruleId: "REMOTE_GENERAL",
          category: "BEST_PRACTICE",
          severity: "INFO",
          title: "Use a conditions file",
          explanation: "Use a conditions file",
          source: "REMOTE_OPENAI",
          meta: false,
        },
      ],
    });
  });

  it("should locate multi-line snippets", () => {
    const raw = JSON.stringify({
      builder_mapping: [
        {
          original_code: "for word in words:\n    stim = visual.TextStim(win, text=word)",
          description: "Word loop",
          builder_equivalent: "Loop over a conditions file with a Text component",
        },
      ],
    });
    const parsed = parseProviderResponse(raw, "google", redacted);

    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(parsed.findings[0].ruleId).toBe("REMOTE_BUILDER_MAPPING");
      expect(parsed.findings[0].source).toBe("REMOTE_GOOGLE");
      expect(parsed.findings[0].line).toBe(1);
      expect(parsed.findings[0].endLine).toBe(2);
      expect(parsed.findings[0].explanation).toBe("Word loop");
    }
  });

  it("should skip invalid items and fall back to default titles", () => {
    const raw = JSON.stringify({ best_practices: [42, { explanation: "Close the window" }] });
    const parsed = parseProviderResponse(raw, "anthropic", redacted);

    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(parsed.findings).toHaveLength(1);
      expect(parsed.findings[0].title).toBe("Best practice suggestion");
      expect(parsed.findings[0].line).toBeUndefined();
    }
  });

  it("should accept general suggestions as objects and shorten long titles", () => {
    const long = "a".repeat(100);
    const raw = JSON.stringify({ general_suggestions: [{ suggestion: long }] });
    const parsed = parseProviderResponse(raw, "openai", redacted);

    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(parsed.findings[0].title).toBe("a".repeat(77) + "...");
      expect(parsed.findings[0].explanation).toBe(long);
    }
  });

  it("should parse truncated responses after repair", () => {
    const raw = '{"summary":"x","performance_optimizations":[{"issue":"A","original_code":"stim.draw()"},{"issue":"B","orig';
    const parsed = parseProviderResponse(raw, "openai", redacted);

    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(parsed.findings.map((finding) => [finding.title, finding.line])).toEqual([["A", 3]]);
    }
  });

  it("should report MALFORMED_RESPONSE for replies that are not JSON", () => {
    expect(parseProviderResponse("Sorry, I cannot help with that.", "openai", redacted)).toEqual({
      ok: false,
      failure: {
        kind: "MALFORMED_RESPONSE",
        provider: "openai",
        message: "OpenAI returned a response that is not JSON",
      },
    });
  });

  it("should report MALFORMED_RESPONSE for JSON without analysis sections", () => {
    const parsed = parseProviderResponse('{"answer": 1}', "anthropic", redacted);

    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.failure.message).toBe("Anthropic returned JSON without any analysis sections");
    }
  });

  it("should report MALFORMED_RESPONSE for sections of the wrong type", () => {
    const parsed = parseProviderResponse('{"summary": 5}', "openai", redacted);

    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.failure.message).toBe("OpenAI returned JSON that does not match the response format");
    }
  });
});

describe("buildAnalysisPrompt", () => {
  it("should focus on the enabled categories", () => {
    const prompt = buildAnalysisPrompt(["PERFORMANCE"], { model: "gpt-4o" });

    expect(prompt.userPrompt).toContain("Focus on:\n1. Performance problems:");
    expect(prompt.userPrompt).not.toContain("Builder components");
    expect(prompt.model).toBe("gpt-4o");
  });

  it("should omit the focus list when no category has one", () => {
    expect(buildAnalysisPrompt(["PRIVACY"]).userPrompt).not.toContain("Focus on:");
  });
});

// ============================================================================
// Error classification
// ============================================================================

describe("classifyErrorKind", () => {
  it("should classify HTTP errors by status", () => {
    expect(classifyErrorKind({ status: 401 })).toBe("AUTH_ERROR");
    expect(classifyErrorKind({ status: 403 })).toBe("AUTH_ERROR");
    expect(classifyErrorKind({ status: 402 })).toBe("QUOTA_EXCEEDED");
    expect(classifyErrorKind({ status: 429, code: "insufficient_quota" })).toBe("QUOTA_EXCEEDED");
    expect(classifyErrorKind({ status: 429, error: { code: "insufficient_quota" } })).toBe("QUOTA_EXCEEDED");
    expect(classifyErrorKind({ status: 429 })).toBe("RATE_LIMIT");
    expect(classifyErrorKind({ status: 529 })).toBe("RATE_LIMIT");
    expect(classifyErrorKind({ status: 500 })).toBe("NETWORK_ERROR");
  });

  it("should classify transport errors as NETWORK_ERROR", () => {
    expect(classifyErrorKind({ name: "APIConnectionError" })).toBe("NETWORK_ERROR");
    expect(classifyErrorKind({ code: "ECONNREFUSED" })).toBe("NETWORK_ERROR");
    expect(classifyErrorKind(new ProviderTimeoutError(50))).toBe("NETWORK_ERROR");
    expect(classifyErrorKind("boom")).toBe("NETWORK_ERROR");
  });
});

describe("classifyProviderError", () => {
  it("should describe the failure without the raw payload", () => {
    const error = { status: 401, error: { message: "Invalid key test-secret" } };

    expect(classifyProviderError(error, "anthropic")).toEqual({
      kind: "AUTH_ERROR",
      provider: "anthropic",
      message: "Anthropic rejected the API key (HTTP 401)",
      status: 401,
    });
  });

  it("should mention the deadline for timeouts", () => {
    expect(classifyProviderError(new ProviderTimeoutError(50), "openai")).toEqual({
      kind: "NETWORK_ERROR",
      provider: "openai",
      message: "OpenAI: Provider did not respond within 50ms",
    });
  });
});

// ============================================================================
// Provider client
// ============================================================================

describe("BackendProviderClient", () => {
  it("should send the prompt with default model settings", async () => {
    const complete = jest.fn(
      (_request: CompletionRequest, _signal: AbortSignal): Promise<Completion> =>
        Promise.resolve({ text: '{"summary":"ok"}', model: "gpt-4o-mini-2024", tokensUsed: 12 })
    );
    const client = new BackendProviderClient(fakeBackend(complete));
    const outcome = await client.submit("x = 1", PROMPT, { timeoutMs: 1000 });

    expect(outcome).toEqual({ ok: true, raw: '{"summary":"ok"}', model: "gpt-4o-mini-2024", tokensUsed: 12 });
    expect(complete.mock.calls[0][0]).toEqual({
      model: "gpt-4o-mini",
      systemPrompt: "system",
      userPrompt: "Review this script.\n\n```python\nx = 1\n```",
      maxTokens: 2000,
      temperature: 0.3,
    });
  });

  it("should treat an empty reply as MALFORMED_RESPONSE", async () => {
    const client = new BackendProviderClient(fakeBackend(() => Promise.resolve({ text: "  ", model: "m" })));
    const outcome = await client.submit("x = 1", PROMPT, { timeoutMs: 1000 });

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: "MALFORMED_RESPONSE", provider: "openai", message: "OpenAI returned an empty response" },
    });
  });

  it("should return thrown SDK errors as failures", async () => {
    const client = new BackendProviderClient(fakeBackend(() => Promise.reject({ status: 429 })));
    const outcome = await client.submit("x = 1", PROMPT, { timeoutMs: 1000 });

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: "RATE_LIMIT", provider: "openai", message: "OpenAI rate limit reached (HTTP 429)", status: 429 },
    });
  });

  it("should give up at the deadline and abort the request", async () => {
    let received: AbortSignal | undefined;
    const client = new BackendProviderClient(
      fakeBackend((_request, signal) => {
        received = signal;
        return new Promise<Completion>(() => undefined);
      })
    );
    const outcome = await client.submit("x = 1", PROMPT, { timeoutMs: 5 });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.kind).toBe("NETWORK_ERROR");
      expect(outcome.failure.message).toBe("OpenAI: Provider did not respond within 5ms");
    }
    expect(received?.aborted).toBe(true);
  });

  it("should clamp timeouts beyond the largest timer delay", async () => {
    const client = new BackendProviderClient(
      fakeBackend(
        () => new Promise<Completion>((resolve) => setTimeout(() => resolve({ text: '{"summary":"ok"}', model: "m" }), 20))
      )
    );
    const outcome = await client.submit("x = 1", PROMPT, { timeoutMs: 3_000_000_000 });

    expect(outcome).toEqual({ ok: true, raw: '{"summary":"ok"}', model: "m", tokensUsed: undefined });
  });
});

describe("buildUserMessage", () => {
  it("should fence the script after the instructions", () => {
    expect(buildUserMessage("win.flip()", PROMPT)).toBe("Review this script.\n\n```python\nwin.flip()\n```");
  });
});

describe("createProviderClient", () => {
  it("should fail with AUTH_ERROR without touching the network when no key is set", async () => {
    const client = createProviderClient("google", {});
    const outcome = await client.submit("x = 1", PROMPT, { timeoutMs: 1000 });

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: "AUTH_ERROR", provider: "google", message: "No API key configured for Google Gemini" },
    });
  });

  it("should reject plain-http endpoints", () => {
    expect(() =>
      createProviderClient("openai", { openai: { apiKey: "test-secret", baseUrl: "http://example.com/v1" } })
    ).toThrow(ConfigurationInvalidError);
  });
});

describe("validateBaseUrl", () => {
  it("should accept https and local http endpoints", () => {
    expect(() => validateBaseUrl("openai", "https://proxy.example.com/v1")).not.toThrow();
    expect(() => validateBaseUrl("openai", "http://localhost:8080/v1")).not.toThrow();
    expect(() => validateBaseUrl("anthropic", "http://127.0.0.1:9000")).not.toThrow();
  });

  it("should reject other endpoints", () => {
    expect(() => validateBaseUrl("google", "not a url")).toThrow("Invalid base URL for google");
    expect(() => validateBaseUrl("google", "ftp://example.com")).toThrow("Base URL for google must use https");
  });
});

// ============================================================================
// SDK back ends
// ============================================================================

describe("OpenAICompatibleBackend", () => {
  const OpenAIMock = jest.requireMock<{ default: jest.Mock }>("openai").default;
  let mockCreate: jest.Mock;

  beforeEach(() => {
    jest.clearAllMocks();
    mockCreate = jest.fn();
    OpenAIMock.mockImplementation(() => ({
      chat: {
        completions: {
          create: mockCreate,
        },
      },
    }));
  });

  const request: CompletionRequest = {
    model: "gemini-1.5-flash",
    systemPrompt: "system",
    userPrompt: "user",
    maxTokens: 100,
    temperature: 0.3,
  };

  it("should point Gemini at its OpenAI-compatible endpoint", () => {
    new OpenAICompatibleBackend("google", "test-secret");

    expect(OpenAIMock).toHaveBeenCalledWith({
      apiKey: "test-secret",
      baseURL: GOOGLE_OPENAI_BASE_URL,
      maxRetries: 0,
    });
  });

  it("should return the first choice and token usage", async () => {
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: '{"summary":"ok"}' } }],
      model: "",
      usage: { total_tokens: 7 },
    });
    const signal = new AbortController().signal;
    const completion = await new OpenAICompatibleBackend("google", "test-secret").complete(request, signal);

    expect(completion).toEqual({ text: '{"summary":"ok"}', model: "gemini-1.5-flash", tokensUsed: 7 });
    expect(mockCreate).toHaveBeenCalledWith(
      {
        model: "gemini-1.5-flash",
        messages: [
          { role: "system", content: "system" },
          { role: "user", content: "user" },
        ],
        max_tokens: 100,
        temperature: 0.3,
      },
      { signal }
    );
  });

  it("should let SDK errors propagate to the client", async () => {
    mockCreate.mockRejectedValue({ status: 401 });
    const backend = new OpenAICompatibleBackend("openai", "test-secret");

    await expect(backend.complete(request, new AbortController().signal)).rejects.toEqual({ status: 401 });
  });
});

describe("AnthropicBackend", () => {
  const AnthropicMock = jest.requireMock<{ default: jest.Mock }>("@anthropic-ai/sdk").default;
  let mockCreate: jest.Mock;

  beforeEach(() => {
    jest.clearAllMocks();
    mockCreate = jest.fn();
    AnthropicMock.mockImplementation(() => ({
      messages: {
        create: mockCreate,
      },
    }));
  });

  it("should join the text blocks of the reply", async () => {
    mockCreate.mockResolvedValue({
      content: [
        { type: "text", text: '{"summary":' },
        { type: "tool_use", id: "t1", name: "noop", input: {} },
        { type: "text", text: '"ok"}' },
      ],
      model: "claude-3-5-haiku-20241022",
      usage: { input_tokens: 10, output_tokens: 5 },
    });
    const backend = new AnthropicBackend("test-secret");
    const completion = await backend.complete(
      { model: "claude-3-5-haiku-20241022", systemPrompt: "system", userPrompt: "user", maxTokens: 100, temperature: 0.3 },
      new AbortController().signal
    );

    expect(AnthropicMock).toHaveBeenCalledWith({ apiKey: "test-secret", baseURL: undefined, maxRetries: 0 });
    expect(completion).toEqual({ text: '{"summary":"ok"}', model: "claude-3-5-haiku-20241022", tokensUsed: 15 });
  });
});

// ============================================================================
// Remote analysis
// ============================================================================

describe("requestRemoteAnalysis", () => {
  it("should parse the reply into findings", async () => {
    const client = new BackendProviderClient(
      fakeBackend(() =>
        Promise.resolve({
          text: JSON.stringify({ summary: "Flips the window", best_practices: [{ issue: "Call core.quit()" }] }),
          model: "gpt-4o-mini",
          tokensUsed: 40,
        })
      )
    );
    const outcome = await requestRemoteAnalysis({
      client,
      redactedText: "win.flip()\n",
      enabledCategories: ["BEST_PRACTICE"],
      timeoutMs: 1000,
    });

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.summary).toBe("Flips the window");
      expect(outcome.findings.map((finding) => finding.ruleId)).toEqual(["REMOTE_BEST_PRACTICE"]);
      expect(outcome.tokensUsed).toBe(40);
    }
  });

  it("should turn an unreadable reply into a failure", async () => {
    const client = new BackendProviderClient(fakeBackend(() => Promise.resolve({ text: "plain prose", model: "m" })));
    const outcome = await requestRemoteAnalysis({
      client,
      redactedText: "win.flip()\n",
      enabledCategories: ["BEST_PRACTICE"],
      timeoutMs: 1000,
    });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.kind).toBe("MALFORMED_RESPONSE");
    }
  });
});
