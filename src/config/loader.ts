import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import AjvModule from "ajv";
import type { SchemaObject, ValidateFunction } from "ajv";
import type { ReviewThresholds } from "../routing/reviewQueue.js";
import type { ExtractedTask, ExtractionResult } from "../types/pipeline.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const ROOT_FROM_DIRNAME = join(__dirname, "..", "..");

/** Project root: from src/config or dist/src/config (local), else process.cwd() when deploy ships config/ at cwd (Trigger.dev). */
function getRoot(): string {
  for (const candidate of [ROOT_FROM_DIRNAME, join(ROOT_FROM_DIRNAME, ".."), process.cwd()]) {
    if (existsSync(join(candidate, "config", "review_thresholds.json"))) return candidate;
  }
  return ROOT_FROM_DIRNAME;
}
const ROOT = getRoot();

const CONFIG_FILES = ["review_thresholds.json"] as const;
const PROMPT_FILES = ["task_extractor.md"] as const;
const SCHEMA_FILES = ["review_thresholds.json", "extraction_result.json"] as const;

export type ConfigName = (typeof CONFIG_FILES)[number];
export type PromptName = (typeof PROMPT_FILES)[number];
export type SchemaName = (typeof SCHEMA_FILES)[number];

const configDir = (usePrivate: boolean) =>
  usePrivate ? join(ROOT, "private", "config") : join(ROOT, "config");
const promptDir = (usePrivate: boolean) =>
  usePrivate ? join(ROOT, "private", "prompts") : join(ROOT, "prompts");

function loadJson(path: string): unknown {
  const raw = readFileSync(path, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (e: unknown) {
    throw new Error(`Invalid JSON at ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

/** Resolve path: private first, then default config/prompts. */
function resolvePath(kind: "config" | "prompts", filename: string): string {
  const dir = kind === "config" ? configDir : promptDir;
  const privatePath = join(dir(true), filename);
  return existsSync(privatePath) ? privatePath : join(dir(false), filename);
}

/** Load a config file with precedence: private/config > config/. */
export function loadConfig(name: ConfigName): unknown {
  const path = resolvePath("config", name);
  if (!existsSync(path)) {
    throw new Error(`Config file not found: ${name} (checked private/config and config/)`);
  }
  return loadJson(path);
}

/** Load a prompt file with precedence: private/prompts > prompts/. */
export function loadPrompt(name: PromptName): string {
  const path = resolvePath("prompts", name);
  if (!existsSync(path)) {
    throw new Error(`Prompt file not found: ${name} (checked private/prompts and prompts/)`);
  }
  return readFileSync(path, "utf-8");
}

// ajv is CommonJS; under NodeNext the default import is module.exports, and the class sits on .default
const ajv = new AjvModule.default({ strict: false, allErrors: true });

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function loadSchema(name: SchemaName): SchemaObject {
  const path = join(ROOT, "schemas", name);
  if (!existsSync(path)) throw new Error(`Schema not found: ${name}`);
  const schema = loadJson(path);
  if (!isSchemaObject(schema)) throw new Error(`Schema ${name} is not a JSON object`);
  return schema;
}

/** Extraction envelope as guaranteed by schemas/extraction_result.json. */
interface ExtractionPayload {
  tasks: ExtractedTask[];
  overall_confidence?: number;
  ambiguities?: string[];
}

let thresholdsValidator: ValidateFunction<ReviewThresholds> | null = null;
let extractionValidator: ValidateFunction<ExtractionPayload> | null = null;

function getThresholdsValidator(): ValidateFunction<ReviewThresholds> {
  if (!thresholdsValidator) {
    thresholdsValidator = ajv.compile<ReviewThresholds>(loadSchema("review_thresholds.json"));
  }
  return thresholdsValidator;
}

function getExtractionValidator(): ValidateFunction<ExtractionPayload> {
  if (!extractionValidator) {
    extractionValidator = ajv.compile<ExtractionPayload>(loadSchema("extraction_result.json"));
  }
  return extractionValidator;
}

function formatErrors(validate: ValidateFunction<unknown>): string {
  return (
    validate.errors?.map((err) => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`).join("; ") ??
    "unknown error"
  );
}

/** Validate review thresholds against schemas/review_thresholds.json. Throws with the failing path if invalid. */
export function validateReviewThresholds(data: unknown): ReviewThresholds {
  const validate = getThresholdsValidator();
  if (!validate(data)) {
    throw new Error(`Config validation failed for review_thresholds.json: ${formatErrors(validate)}`);
  }
  if (data.highPriorityThreshold > data.autoApproveThreshold) {
    throw new Error(
      "Config validation failed for review_thresholds.json: highPriorityThreshold must not exceed autoApproveThreshold"
    );
  }
  return {
    autoApproveThreshold: data.autoApproveThreshold,
    highPriorityThreshold: data.highPriorityThreshold,
  };
}

/** Load and validate config/review_thresholds.json (private/config overrides). */
export function loadReviewThresholds(): ReviewThresholds {
  return validateReviewThresholds(loadConfig("review_thresholds.json"));
}

export type ExtractionValidation =
  | { ok: true; value: Pick<ExtractionResult, "tasks" | "overall_confidence" | "ambiguities"> }
  | { ok: false; error: string };

/**
 * Validate parsed model output against schemas/extraction_result.json.
 * Only the envelope and each task's description are checked; other task fields are
 * normalized during scoring, so one malformed field never fails the batch.
 */
export function validateExtraction(data: unknown): ExtractionValidation {
  const validate = getExtractionValidator();
  if (!validate(data)) {
    return { ok: false, error: `Extraction validation failed: ${formatErrors(validate)}` };
  }
  return {
    ok: true,
    value: {
      tasks: data.tasks,
      overall_confidence: data.overall_confidence ?? 0,
      ambiguities: data.ambiguities ?? [],
    },
  };
}
