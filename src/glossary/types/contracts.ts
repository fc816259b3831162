import type { GlossaryEntry } from "./domain";

/**
 * Glossary store interface: exact-match get by term.
 */
export interface GlossaryLookupRepository {
  getByTerm(params: { term: string }): Promise<GlossaryEntry | null>;
}
