/**
 * Term extraction from the heterogeneous invocation payloads the handler
 * receives: API Gateway proxy events (query string, path parameter, JSON
 * body) or a direct Lambda invoke carrying `term` at the top level.
 */
import { z } from "zod";
import type { LookupDebugInfo } from "./types/domain";

const PayloadSchema = z.record(z.unknown());

// Any object carrying a non-empty string `term`; other fields are ignored
const TermCarrierSchema = z.object({ term: z.string().min(1) }).passthrough();

type Payload = z.infer<typeof PayloadSchema>;

function toPayload(payload: unknown): Payload | undefined {
  const parsed = PayloadSchema.safeParse(payload);
  return parsed.success ? parsed.data : undefined;
}

function readTerm(source: unknown): string | undefined {
  const parsed = TermCarrierSchema.safeParse(source);
  return parsed.success ? parsed.data.term : undefined;
}

/**
 * Parses JSON text, returning `undefined` instead of throwing on bad input.
 */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Returns the request body as text, base64-decoded when the gateway flagged it.
 */
export function decodeBody(payload: unknown): string | undefined {
  const event = toPayload(payload);
  if (!event || typeof event.body !== "string" || event.body === "") {
    return undefined;
  }
  if (event.isBase64Encoded === true) {
    return Buffer.from(event.body, "base64").toString("utf8");
  }
  return event.body;
}

function readBodyTerm(payload: unknown): string | undefined {
  const text = decodeBody(payload);
  if (text === undefined) return undefined;
  return readTerm(tryParseJson(text));
}

/**
 * Extracts the lookup term. Sources are tried in order and the first
 * non-empty string wins:
 *   1. queryStringParameters.term
 *   2. pathParameters.term
 *   3. term inside the JSON body (unparseable bodies count as absent)
 *   4. top-level term
 * Returns "" when no source carries a term. The value is never trimmed.
 */
export function extractTerm(payload: unknown): string {
  const event = toPayload(payload);
  if (!event) return "";

  const sources: Array<() => string | undefined> = [
    () => readTerm(event.queryStringParameters),
    () => readTerm(event.pathParameters),
    () => readBodyTerm(event),
    () => readTerm(event),
  ];

  for (const source of sources) {
    const term = source();
    if (term) return term;
  }
  return "";
}

/**
 * Echo of the request shape returned with 400 responses.
 */
export function buildDebugInfo(payload: unknown): LookupDebugInfo {
  const event = toPayload(payload) ?? {};
  return {
    query_params: event.queryStringParameters ?? null,
    path_params: event.pathParameters ?? null,
    body: event.body ?? null,
    http_method: event.httpMethod ?? null,
    event_keys: Object.keys(event).sort(),
  };
}
