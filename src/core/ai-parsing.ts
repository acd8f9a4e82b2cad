import { z } from "zod";

import { SEVERITIES, VIOLATION_KINDS } from "./types.js";

const violationWireSchema = z.object({
  kind: z.enum(VIOLATION_KINDS),
  severity: z.enum(SEVERITIES),
  file_path: z.string().min(1).nullable(),
  description: z.string().min(1),
  recommendation: z.string().min(1)
});

export const verdictWireSchema = z.object({
  alignment_score: z.number(),
  violations: z.array(violationWireSchema),
  summary: z.string().min(1),
  approval_required: z.boolean().optional()
});

export type VerdictWire = z.infer<typeof verdictWireSchema>;

/** JSON Schema handed to providers that support schema-locked output. */
export const VERDICT_JSON_SCHEMA = {
  type: "object",
  additionalProperties: false,
  required: ["alignment_score", "violations", "summary", "approval_required"],
  properties: {
    alignment_score: { type: "number", minimum: 0, maximum: 1 },
    violations: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["kind", "severity", "file_path", "description", "recommendation"],
        properties: {
          kind: { type: "string", enum: [...VIOLATION_KINDS] },
          severity: { type: "string", enum: [...SEVERITIES] },
          file_path: { type: ["string", "null"] },
          description: { type: "string" },
          recommendation: { type: "string" }
        }
      }
    },
    summary: { type: "string" },
    approval_required: { type: "boolean" }
  }
} as const;

export type ParseOutcome<T> = { ok: true; data: T } | { ok: false; issues: string[] };

function pullCodeBlockCandidates(raw: string): string[] {
  const candidates: string[] = [];
  const regex = /```(?:json)?\s*([\s\S]*?)```/gi;

  for (;;) {
    const match = regex.exec(raw);
    if (!match) break;
    if (match[1]) candidates.push(match[1].trim());
  }

  return candidates;
}

function pullBalancedJsonCandidates(raw: string, openChar: "{" | "[", closeChar: "}" | "]"): string[] {
  const candidates: string[] = [];
  let start = -1;
  let depth = 0;
  let inString = false;
  let escapeNext = false;

  for (let index = 0; index < raw.length; index += 1) {
    const char = raw[index];
    if (!char) continue;

    if (start === -1) {
      if (char === openChar) {
        start = index;
        depth = 1;
        inString = false;
        escapeNext = false;
      }
      continue;
    }

    if (inString) {
      if (escapeNext) {
        escapeNext = false;
        continue;
      }
      if (char === "\\") {
        escapeNext = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }

    if (char === "\"") {
      inString = true;
      continue;
    }

    if (char === openChar) {
      depth += 1;
      continue;
    }

    if (char === closeChar) {
      depth -= 1;
      if (depth === 0) {
        candidates.push(raw.slice(start, index + 1).trim());
        start = -1;
      }
    }
  }

  return candidates;
}

function pullBraceCandidates(raw: string): string[] {
  return [...pullBalancedJsonCandidates(raw, "{", "}"), ...pullBalancedJsonCandidates(raw, "[", "]")];
}

function parseJsonLikeString(value: string): unknown {
  const trimmed = value.trim();
  if (!trimmed) return value;

  const candidates = [trimmed, ...pullCodeBlockCandidates(trimmed), ...pullBraceCandidates(trimmed)];

  for (const candidate of candidates) {
    if (!candidate) continue;
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }

  return value;
}

function normalizePayload(payload: unknown): unknown {
  if (typeof payload === "string") {
    const jsonLike = parseJsonLikeString(payload);
    if (jsonLike === payload) return payload;
    return normalizePayload(jsonLike);
  }

  if (Array.isArray(payload)) {
    return payload.map((item) => normalizePayload(item));
  }

  if (!payload || typeof payload !== "object") return payload;

  const record = payload as Record<string, unknown>;
  if (record.structured_output && typeof record.structured_output === "object") {
    return normalizePayload(record.structured_output);
  }

  if (record.verdict && typeof record.verdict === "object") {
    return normalizePayload(record.verdict);
  }

  if (record.result && typeof record.result === "string") {
    const parsed = parseJsonLikeString(record.result);
    if (parsed !== record.result) return normalizePayload(parsed);
  }

  if (record.output && typeof record.output === "string") {
    const parsed = parseJsonLikeString(record.output);
    if (parsed !== record.output) return normalizePayload(parsed);
  }

  return payload;
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/** First candidate that matches `schema`, or the issues of the first near miss for a repair prompt. */
export function parseWithSchemaDetailed<T>(raw: string, schema: z.ZodType<T>): ParseOutcome<T> {
  const candidates = [raw.trim(), ...pullCodeBlockCandidates(raw), ...pullBraceCandidates(raw)];
  let firstIssues: string[] | null = null;

  for (const candidate of candidates) {
    if (!candidate) continue;

    let parsed: unknown;
    try {
      parsed = normalizePayload(JSON.parse(candidate));
    } catch {
      continue;
    }

    const items = Array.isArray(parsed) ? parsed.map((item) => normalizePayload(item)) : [parsed];
    for (const item of items) {
      const validated = schema.safeParse(item);
      if (validated.success) return { ok: true, data: validated.data };
      firstIssues ??= describeIssues(validated.error);
    }
  }

  return { ok: false, issues: firstIssues ?? ["output contains no parseable JSON object"] };
}

export function parseVerdictOutput(raw: string): ParseOutcome<VerdictWire> {
  return parseWithSchemaDetailed(raw, verdictWireSchema);
}
