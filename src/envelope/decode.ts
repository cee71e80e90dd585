/**
 * Response Envelope Decoder.
 *
 * Capability responses may arrive as text, as parsed data, or as an MCP
 * tool result whose text content is itself a serialized result, nested
 * more than once. decode() unwraps one level per pass:
 *
 *   1. parse text as JSON (already-parsed data skips this)
 *   2. an error marker stops with a ServiceError
 *   3. an embedded serialized field is unwrapped and the pass repeats
 *   4. otherwise the structure is validated against the payload schema
 *
 * A flat payload and the same payload wrapped once decode identically.
 */
import type { z } from "zod";
import { getLogger } from "../infra/logger.ts";
import { ErrorKind, failure, success, type Envelope } from "./types.ts";

const logger = getLogger("envelope.decode");

export const DEFAULT_MAX_DEPTH = 3;
const RAW_TEXT_LIMIT = 200;

/** Field names a capability uses to say "this is an error". */
export const ERROR_MARKERS = ["error_kind", "error_type", "errorKind", "error"] as const;

export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface DecodeOptions {
  /** Levels inspected before giving up, the outermost included. */
  maxDepth?: number;
}

type Record_ = Record<string, unknown>;

function isRecord(value: unknown): value is Record_ {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function truncateRaw(text: string, limit: number = RAW_TEXT_LIMIT): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/** Capability error code under any recognized marker, or null. */
function findErrorCode(data: Record_): string | null {
  for (const marker of ERROR_MARKERS) {
    const value = data[marker];
    if (typeof value === "string" && value.length > 0) return value;
  }
  return null;
}

function errorFromMarker(data: Record_, code: string): Envelope<never> {
  const message =
    typeof data["message"] === "string" && data["message"]
      ? data["message"]
      : typeof data["error"] === "string" && data["error"]
        ? data["error"]
        : code;
  const details = isRecord(data["details"]) ? data["details"] : {};
  return failure(ErrorKind.SERVICE, message, { ...details, code });
}

/** Serialized text embedded under a known field: MCP `content` or a `text` string. */
function embeddedText(data: Record_): string | null {
  const content = data["content"];
  if (Array.isArray(content)) {
    for (const block of content) {
      if (isRecord(block) && block["type"] === "text" && typeof block["text"] === "string") {
        return block["text"];
      }
    }
  }
  if (typeof data["text"] === "string") return data["text"];
  return null;
}

/**
 * Decode a raw capability response into a typed Envelope. Never throws.
 */
export function decode<T>(
  raw: unknown,
  schema: PayloadSchema<T>,
  options: DecodeOptions = {},
): Envelope<T> {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  let current: unknown = raw;
  let flaggedError = false;
  let lastText: string | null = null;

  for (let level = 1; level <= maxDepth; level++) {
    if (typeof current === "string") {
      lastText = current;
      const parsed = parseJson(current);
      if (!parsed.ok) {
        if (flaggedError) {
          // A tool error with a plain-text explanation.
          return failure(ErrorKind.SERVICE, current.trim() || "Capability reported an error");
        }
        logger.warn({ level, raw: truncateRaw(current) }, "envelope_not_json");
        return failure(ErrorKind.DECODE, "Response is not valid JSON", {
          raw: truncateRaw(current),
          level,
        });
      }
      current = parsed.value;
    }

    if (isRecord(current)) {
      const code = findErrorCode(current);
      if (code !== null) return errorFromMarker(current, code);

      if (current["isError"] === true) flaggedError = true;

      const inner = embeddedText(current);
      if (inner !== null) {
        current = inner;
        continue;
      }
    }

    const result = schema.safeParse(current);
    if (result.success) {
      if (flaggedError) {
        return failure(ErrorKind.SERVICE, "Capability reported an error", { level });
      }
      return success(result.data);
    }

    if (flaggedError) {
      return failure(ErrorKind.SERVICE, "Capability reported an error", {
        raw: lastText === null ? null : truncateRaw(lastText),
      });
    }
    return failure(ErrorKind.DECODE, "Response does not match the expected payload", {
      issues: result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
      raw: lastText === null ? null : truncateRaw(lastText),
      level,
    });
  }

  logger.warn({ maxDepth }, "envelope_nesting_exhausted");
  return failure(ErrorKind.DECODE, `Response nesting exceeds ${maxDepth} levels`, {
    raw: lastText === null ? null : truncateRaw(lastText),
    maxDepth,
  });
}
