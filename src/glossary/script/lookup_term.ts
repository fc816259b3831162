/* eslint-disable no-console */
/**
 * Local lookup against the configured glossary table.
 *
 * Usage: npm run lookup -- "<term>" [query|path|body|direct]
 */
import { lookupTerm } from "../lookup_term";

export type PayloadSource = "query" | "path" | "body" | "direct";

const SOURCES: readonly PayloadSource[] = ["query", "path", "body", "direct"];

function isPayloadSource(value: string): value is PayloadSource {
  return SOURCES.some(source => source === value);
}

/**
 * Builds the payload API Gateway (or a direct invoke) would deliver for `term`.
 */
export function buildPayload(
  term: string,
  source: PayloadSource
): Record<string, unknown> {
  switch (source) {
    case "query":
      return { httpMethod: "GET", queryStringParameters: { term } };
    case "path":
      return { httpMethod: "GET", pathParameters: { term } };
    case "body":
      return { httpMethod: "POST", body: JSON.stringify({ term }) };
    case "direct":
      return { term };
  }
}

export function parseArgs(argv: string[]): {
  term: string;
  source: PayloadSource;
} {
  const term = argv[0] ?? "";
  const rawSource = (argv[1] ?? "query").toLowerCase();
  const source = isPayloadSource(rawSource) ? rawSource : "query";
  return { term, source };
}

async function main(): Promise<void> {
  const { term, source } = parseArgs(process.argv.slice(2));
  const response = await lookupTerm(buildPayload(term, source));
  console.log(
    JSON.stringify(
      { ...response, body: JSON.parse(response.body) as unknown },
      null,
      2
    )
  );
  if (response.statusCode >= 500) process.exitCode = 1;
}

if (require.main === module) {
  main().catch(err => {
    console.error(err);
    process.exitCode = 1;
  });
}
