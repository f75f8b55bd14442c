import { logger } from "@trigger.dev/sdk/v3";
import Anthropic from "@anthropic-ai/sdk";
import { loadPrompt, validateExtraction } from "../config/loader.js";
import type { NormalizedEmail } from "../email/parse.js";
import type { ExtractionResult } from "../types/pipeline.js";

const DEFAULT_MODEL = "claude-sonnet-4-5";
const TIMEOUT_MS = 60_000;
const MAX_RETRIES = 5; // parse + rate/transient with backoff
const MAX_TOKENS = 2000;

/** The slice of the Anthropic client the extractor calls. */
export interface ExtractionClient {
  messages: {
    create(
      body: {
        model: string;
        max_tokens: number;
        temperature: number;
        system: string;
        messages: Array<{ role: "user"; content: string }>;
      },
      options?: { signal?: AbortSignal }
    ): Promise<{ content: Array<{ type: string; text?: string }> }>;
  };
}

export interface ExtractorOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** Base delay for exponential backoff on rate-limit/transient errors. */
  baseDelayMs?: number;
  /** Injected client; built from apiKey when absent. */
  client?: ExtractionClient;
  now?: () => Date;
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

function jitter(baseMs: number): number {
  return Math.floor(baseMs * (0.5 + Math.random() * 0.5));
}

function errorStatus(e: unknown): number | null {
  if (typeof e !== "object" || e === null) return null;
  const status = "status" in e ? e.status : "code" in e ? e.code : undefined;
  return typeof status === "number" ? status : null;
}

/** True if error is rate limit, overloaded, timeout, or 5xx (retry with backoff). */
export function isRetryableRateOrTransientError(e: unknown): boolean {
  const status = errorStatus(e);
  if (status === 429) return true;
  if (status !== null && status >= 500) return true;
  if (!(e instanceof Error)) return false;
  const msg = e.message.toLowerCase();
  return (
    msg.includes("429") ||
    msg.includes("rate") ||
    msg.includes("overloaded") ||
    msg.includes("timeout") ||
    msg.includes("unavailable") ||
    e.name === "AbortError"
  );
}

function interpolate(template: string, vars: Record<string, string>): string {
  let out = template;
  for (const [k, v] of Object.entries(vars)) {
    out = out.split(`{{${k}}}`).join(v);
  }
  return out;
}

/** Render prompts/task_extractor.md for one email. */
export function buildExtractionPrompt(email: NormalizedEmail, template: string): string {
  return interpolate(template, {
    sender_context: email.from ? `\nEmail from: ${email.from}` : "",
    email_content: email.subject ? `Subject: ${email.subject}\n\n${email.bodyText}` : email.bodyText,
  });
}

/** Standard error response; the coordinator turns it into a failed batch. */
export function createErrorResponse(message: string, now: Date = new Date()): ExtractionResult {
  return {
    tasks: [],
    overall_confidence: 0,
    ambiguities: [message],
    extraction_timestamp: now.toISOString(),
    error: true,
  };
}

export type ParsedExtraction =
  | { ok: true; value: Pick<ExtractionResult, "tasks" | "overall_confidence" | "ambiguities"> }
  | { ok: false; error: string };

/** Parse model text (optionally wrapped in a ```json fence) and validate the envelope. */
export function parseExtractionResponse(raw: string): ParsedExtraction {
  const trimmed = raw.trim().replace(/^```(?:json)?\s*/i, "").replace(/```\s*$/, "").trim();
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return { ok: false, error: "Invalid JSON response from LLM" };
  }
  return validateExtraction(parsed);
}

/**
 * Call Anthropic to extract tasks from one email with strict JSON output.
 * Retries on parse failure; exponential backoff on 429/rate/overloaded/timeout.
 * Never throws for model failures: returns the error response instead.
 */
export async function extractTasks(
  email: NormalizedEmail,
  options: ExtractorOptions = {}
): Promise<ExtractionResult> {
  const now = options.now ?? (() => new Date());
  const model = options.model ?? process.env.DEFAULT_ANTHROPIC_MODEL ?? DEFAULT_MODEL;
  const timeoutMs = options.timeoutMs ?? TIMEOUT_MS;
  const maxRetries = options.maxRetries ?? MAX_RETRIES;
  const baseDelayMs = options.baseDelayMs ?? 1000;

  let client = options.client;
  if (!client) {
    const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      logger.error("Task extractor: missing API key", { provider: "anthropic" });
      return createErrorResponse("ANTHROPIC_API_KEY is required", now());
    }
    client = new Anthropic({ apiKey });
  }

  const prompt = buildExtractionPrompt(email, loadPrompt("task_extractor.md"));
  let lastError = "Task extraction failed";

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    const willRetry = attempt < maxRetries - 1;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await client.messages.create(
        {
          model,
          max_tokens: MAX_TOKENS,
          temperature: 0,
          system: "You respond only with valid JSON. No markdown code fences, no explanation.",
          messages: [{ role: "user", content: prompt }],
        },
        { signal: controller.signal }
      );

      const text = response.content.find((b) => b.type === "text")?.text ?? "";
      const parsed: ParsedExtraction = text.trim()
        ? parseExtractionResponse(text)
        : { ok: false, error: "Anthropic returned empty or non-text content" };
      if (parsed.ok) {
        logger.info("Task extractor: tasks extracted", {
          provider: "anthropic",
          model,
          taskCount: parsed.value.tasks.length,
          overallConfidence: parsed.value.overall_confidence,
        });
        return { ...parsed.value, extraction_timestamp: now().toISOString(), model_used: model };
      }
      lastError = parsed.error;
      logger.warn("Task extractor: unusable response", {
        provider: "anthropic",
        attempt: attempt + 1,
        error: parsed.error,
        rawPreview: text.slice(0, 200),
        willRetry,
      });
    } catch (e) {
      lastError = e instanceof Error ? e.message : String(e);
      const retryable = isRetryableRateOrTransientError(e);
      logger.warn("Task extractor: attempt failed", {
        provider: "anthropic",
        attempt: attempt + 1,
        errorMessage: lastError,
        errorName: e instanceof Error ? e.name : null,
        status: errorStatus(e),
        willRetry: retryable && willRetry,
      });
      if (!retryable) break;
      if (willRetry) await sleep(jitter(baseDelayMs * Math.pow(2, attempt)));
    } finally {
      clearTimeout(timeout);
    }
  }

  logger.error("Task extractor: all retries exhausted", {
    provider: "anthropic",
    errorMessage: lastError,
  });
  return createErrorResponse(lastError, now());
}
