import type {
  GlossaryEntry,
  LookupDebugInfo,
  LookupResponseBody,
  ResponseEnvelope,
} from "./types/domain";

// Open CORS: any origin may call the endpoint unauthenticated
export const RESPONSE_HEADERS: Readonly<Record<string, string>> = {
  "Content-Type": "application/json",
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "OPTIONS,GET,POST",
  "Access-Control-Allow-Headers": "Content-Type",
};

export const TERM_REQUIRED_MESSAGE = "Term parameter is required";

function json(statusCode: number, body: LookupResponseBody): ResponseEnvelope {
  return {
    statusCode,
    headers: { ...RESPONSE_HEADERS },
    body: JSON.stringify(body),
  };
}

export function found(entry: GlossaryEntry): ResponseEnvelope {
  return json(200, { term: entry.term, definition: entry.definition });
}

export function termRequired(debug: LookupDebugInfo): ResponseEnvelope {
  return json(400, { message: TERM_REQUIRED_MESSAGE, debug });
}

export function termNotFound(term: string): ResponseEnvelope {
  return json(404, { message: `Term "${term}" not found` });
}

export function internalError(err: unknown): ResponseEnvelope {
  const message = err instanceof Error ? err.message : String(err);
  return json(500, { error: "Internal server error", message });
}
