/**
 * A single dictionary entry. `term` is the exact, case- and
 * whitespace-sensitive key the caller supplied.
 */
export interface GlossaryEntry {
  term: string;
  definition: string;
}

export interface ResponseEnvelope {
  statusCode: number;
  headers: Record<string, string>;
  body: string; // JSON-serialized
}

export interface LookupDebugInfo {
  query_params: unknown;
  path_params: unknown;
  body: unknown;
  http_method: unknown;
  event_keys: string[];
}

export type LookupResponseBody =
  | GlossaryEntry
  | { message: string; debug: LookupDebugInfo }
  | { message: string }
  | { error: string; message: string };
