import type {
  AiAnalysis,
  NarrativeGenerator,
  NarrativeRequest,
  NarrativeResult
} from "../../modules/alerting/types.js";

const DEFAULT_ANALYSIS: AiAnalysis = Object.freeze({
  alert: "Weather update for agricultural activities",
  impact: "Monitor crops regularly",
  recommendations: "Continue routine farming activities"
});

const EMPTY_IMPACT_VALUES = new Set(["", "none", "n/a"]);

export interface OpenAiNarrativeGeneratorOptions {
  apiKey: string | undefined;
  baseUrl: string;
  model: string;
  requestTimeoutMs: number;
  fetchImpl?: typeof fetch;
}

export class NarrativeRequestError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "NarrativeRequestError";
  }
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object";
}

function asNonEmptyString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function stripTrailingSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

function extractJsonCandidate(text: string): string | undefined {
  const fencedMatch = text.match(/```json\s*([\s\S]*?)```/i);
  if (fencedMatch?.[1]) {
    return fencedMatch[1].trim();
  }

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start >= 0 && end > start) {
    return text.slice(start, end + 1);
  }

  return undefined;
}

export function extractChoiceContent(response: unknown): string {
  if (!isObjectRecord(response)) {
    throw new NarrativeRequestError("LLM response is not an object");
  }

  const choices = response.choices;
  if (Array.isArray(choices) && choices.length > 0) {
    const first: unknown = choices[0];
    if (isObjectRecord(first) && isObjectRecord(first.message)) {
      const content = first.message.content;
      if (typeof content === "string") {
        return content;
      }
      if (Array.isArray(content)) {
        const textParts = content
          .map((item: unknown) => {
            if (!isObjectRecord(item)) {
              return undefined;
            }
            return asNonEmptyString(item.text) ?? asNonEmptyString(item.content);
          })
          .filter((part): part is string => typeof part === "string");

        if (textParts.length > 0) {
          return textParts.join("\n");
        }
      }
    }
  }

  const outputText = asNonEmptyString(response.output_text) ?? asNonEmptyString(response.text);
  if (outputText) {
    return outputText;
  }

  throw new NarrativeRequestError("LLM response did not include text content");
}

/**
 * Reads `{alert, impact, recommendations}` from the model's text, accepting
 * bare JSON, fenced JSON or JSON embedded in prose. Missing fields take the
 * default wording.
 */
export function parseNarrativeContent(content: string): AiAnalysis {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    const candidate = extractJsonCandidate(content);
    if (!candidate) {
      throw new NarrativeRequestError("Unable to parse JSON from LLM response content");
    }
    try {
      parsed = JSON.parse(candidate);
    } catch {
      throw new NarrativeRequestError("Unable to parse JSON from LLM response content");
    }
  }

  if (!isObjectRecord(parsed)) {
    throw new NarrativeRequestError("LLM response JSON is not an object");
  }

  return {
    alert: asNonEmptyString(parsed.alert) ?? DEFAULT_ANALYSIS.alert,
    impact: asNonEmptyString(parsed.impact) ?? DEFAULT_ANALYSIS.impact,
    recommendations: asNonEmptyString(parsed.recommendations) ?? DEFAULT_ANALYSIS.recommendations
  };
}

export function composeEnhancedMessage(analysis: AiAnalysis, request: NarrativeRequest): string {
  let message = `🤖 AI Weather Alert for ${request.village}, ${request.district}: ${analysis.alert}`;
  if (!EMPTY_IMPACT_VALUES.has(analysis.impact.trim().toLowerCase())) {
    message += ` 🌾 Crop Impact (${request.crop} - ${request.stage}): ${analysis.impact}`;
  }
  return message;
}

function buildSystemPrompt(): string {
  return [
    "You are an agricultural weather advisor for smallholder farmers.",
    'Return only a JSON object with string fields "alert", "impact" and "recommendations".',
    "Do not include markdown, prose, or code fences."
  ].join(" ");
}

function buildUserPrompt(request: NarrativeRequest): string {
  return [
    `Location: ${request.village}, ${request.district} (${request.latitude}, ${request.longitude}).`,
    `Crop: ${request.crop} at the ${request.stage} stage.`,
    "Observed weather JSON:",
    JSON.stringify(request.weather),
    "Describe the expected weather alert, its impact on the crop at this stage, and recommended actions."
  ].join("\n");
}

export class OpenAiNarrativeGenerator implements NarrativeGenerator {
  readonly enabled: boolean;

  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAiNarrativeGeneratorOptions) {
    this.apiKey = asNonEmptyString(options.apiKey);
    this.enabled = this.apiKey !== undefined;
    this.baseUrl = stripTrailingSlash(options.baseUrl.trim());
    this.model = options.model;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async generate(request: NarrativeRequest, signal?: AbortSignal): Promise<NarrativeResult> {
    if (!this.apiKey) {
      throw new NarrativeRequestError("AI narrative is disabled: no API key configured");
    }

    const body = {
      model: this.model,
      temperature: 0.3,
      response_format: {
        type: "json_object"
      },
      messages: [
        { role: "system", content: buildSystemPrompt() },
        { role: "user", content: buildUserPrompt(request) }
      ]
    };

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.requestTimeoutMs);
    const requestSignal = signal ? AbortSignal.any([controller.signal, signal]) : controller.signal;

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify(body),
        signal: requestSignal
      });

      if (!response.ok) {
        await response.text();
        throw new NarrativeRequestError(
          `LLM request failed with HTTP ${response.status}`,
          response.status
        );
      }

      const raw: unknown = await response.json();
      const analysis = parseNarrativeContent(extractChoiceContent(raw));
      return { ...analysis, enhancedMessage: composeEnhancedMessage(analysis, request) };
    } catch (error) {
      if (controller.signal.aborted && !signal?.aborted) {
        throw new NarrativeRequestError(
          `LLM request timed out after ${this.requestTimeoutMs}ms`,
          408
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
