/**
 * Business logic: resolve a glossary term from an invocation payload.
 */
import type { Logger } from "pino";
import { getLogger } from "@src/util/logger";
import { getGlossaryRepository } from "./db/glossary_repository";
import { buildDebugInfo, extractTerm } from "./payload";
import {
  found,
  internalError,
  termNotFound,
  termRequired,
} from "./responses";
import type { GlossaryLookupRepository } from "./types/contracts";
import type { ResponseEnvelope } from "./types/domain";

export interface LookupTermDependencies {
  repository?: GlossaryLookupRepository;
  logger?: Logger;
}

/**
 * Always resolves to an envelope: 200 found, 400 missing term,
 * 404 unknown term, 500 for any fault along the way.
 */
export async function lookupTerm(
  payload: unknown,
  deps: LookupTermDependencies = {}
): Promise<ResponseEnvelope> {
  const logger = deps.logger ?? getLogger("glossary/lookup_term");
  try {
    logger.info({ event: payload }, "lookup request received");

    const term = extractTerm(payload);
    logger.info({ term }, "extracted term");

    if (!term) {
      return termRequired(buildDebugInfo(payload));
    }

    const repository = deps.repository ?? getGlossaryRepository();
    const entry = await repository.getByTerm({ term });
    logger.debug({ term, found: entry != null }, "glossary lookup result");

    if (!entry) {
      return termNotFound(term);
    }
    return found({ term, definition: entry.definition });
  } catch (err) {
    logger.error({ err }, "glossary lookup failed");
    return internalError(err);
  }
}
