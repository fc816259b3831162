// Lambda handler for looking up a glossary term.
//
// Endpoints: GET /lookup?term=..., GET /lookup/{term}, POST /lookup { "term": ... }
// Also accepts direct invocation with { "term": ... }.
// Returns:
//   200 { term, definition }
//   400 { message, debug } when no term is supplied
//   404 { message } when the term is not in the glossary
//   500 { error, message } on internal errors
// Env:
//   - GLOSSARY_TABLE (optional) overrides the derived <APP_NAME>-<stage>-GlossaryTable name
import type { Context } from "aws-lambda";
import { lookupTerm } from "@src/glossary/lookup_term";
import type { ResponseEnvelope } from "@src/glossary/types/domain";
import { withRequestContext } from "@src/util/logger";

export const handler = async (
  event: unknown,
  context?: Context
): Promise<ResponseEnvelope> => {
  const logger = withRequestContext("functions/lookup_term", context ?? {});
  return lookupTerm(event, { logger });
};
