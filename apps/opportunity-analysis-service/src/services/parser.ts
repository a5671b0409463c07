import { z } from "zod";
import { ClassificationResult } from "../types/opportunity";
import { ParseError, ParseErrorField } from "../lib/errors";
import { resolveOpportunityType, UNKNOWN_OPPORTUNITY_TYPE } from "./taxonomy";

export const MAX_FALLBACK_REASONING_LENGTH = 200;

const classificationPayloadSchema = z.object({
  type: z.string(),
  confidence: z.union([z.number(), z.string()]),
  reasoning: z.string(),
});

export type ClassificationPayload = z.infer<typeof classificationPayloadSchema>;

/**
 * Turn the model's raw answer into a ClassificationResult.
 *
 * Tolerated: prose or code fences around the JSON object, a numeric-string
 * confidence, out-of-range confidence (clamped), labels outside the taxonomy
 * (mapped to Unknown). Anything else throws ParseError naming the field.
 */
export function parseClassification(raw: string): ClassificationResult {
  if (!raw || !raw.trim()) {
    throw new ParseError("content", raw, "empty response");
  }

  // Prose around the payload may carry braces of its own, so try each candidate
  // object in turn. Field errors outrank syntax errors when nothing matches.
  let syntaxError: ParseError | null = null;
  let fieldError: ParseError | null = null;

  for (let start = raw.indexOf("{"); start !== -1; start = raw.indexOf("{", start + 1)) {
    const json = balancedObjectAt(raw, start);
    if (json === null) continue;

    let data: unknown;
    try {
      data = JSON.parse(json);
    } catch (error) {
      syntaxError ??= new ParseError("payload", raw, error instanceof Error ? error.message : "invalid JSON");
      continue;
    }

    const parsed = classificationPayloadSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      fieldError ??= new ParseError(issueField(issue?.path[0]), raw, issue?.message);
      continue;
    }

    const confidence = normalizeConfidence(parsed.data.confidence);
    if (confidence === null) {
      fieldError ??= new ParseError("confidence", raw, `not a number: ${String(parsed.data.confidence)}`);
      continue;
    }

    return toResult(parsed.data, confidence, raw);
  }

  throw fieldError ?? syntaxError ?? new ParseError("payload", raw, "no JSON object found");
}

function toResult(payload: ClassificationPayload, confidence: number, raw: string): ClassificationResult {
  const type = resolveOpportunityType(payload.type);
  if (type === null) {
    return {
      type: UNKNOWN_OPPORTUNITY_TYPE,
      confidence: 0,
      reasoning: truncate(raw.trim(), MAX_FALLBACK_REASONING_LENGTH),
    };
  }

  return {
    type,
    confidence,
    reasoning: payload.reasoning,
  };
}

/**
 * First balanced `{...}` in the text, ignoring braces inside strings
 */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  return start === -1 ? null : balancedObjectAt(text, start);
}

function balancedObjectAt(text: string, start: number): string | null {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/**
 * Integer in [0, 100], or null if the value isn't numeric
 */
export function normalizeConfidence(value: number | string): number | null {
  const num = typeof value === "number" ? value : Number(value.trim().replace(/%$/, ""));
  if (typeof value === "string" && !value.trim()) return null;
  if (!Number.isFinite(num)) return null;
  return Math.min(100, Math.max(0, Math.round(num)));
}

function issueField(key: string | number | undefined): ParseErrorField {
  if (key === "type" || key === "confidence" || key === "reasoning") return key;
  return "payload";
}

// Cut on code points so a surrogate pair is never split
function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length > max ? chars.slice(0, max).join("") : text;
}
