/**
 * Glossary repository backed by a DynamoDB table.
 *
 * Assumptions:
 * - Partition key: term = the exact term string, e.g. "AWS KMS"
 * - No sort key; one item per term carrying a string `definition`
 */
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient, GetCommand } from "@aws-sdk/lib-dynamodb";
import { z } from "zod";
import { DynamoTable, resolveDynamoTableName } from "@src/util/dynamodb";
import type { GlossaryLookupRepository } from "../types/contracts";
import type { GlossaryEntry } from "../types/domain";

const GlossaryItemSchema = z.object({ definition: z.string() }).passthrough();

export class MalformedGlossaryItemError extends Error {
  constructor(
    readonly term: string,
    detail: string
  ) {
    super(`Malformed glossary item for term "${term}": ${detail}`);
    this.name = "MalformedGlossaryItemError";
  }
}

export interface GlossaryRepositoryOptions {
  tableName: string;
  client?: DynamoDBDocumentClient;
}

export class GlossaryRepository implements GlossaryLookupRepository {
  private readonly table: string;
  private readonly doc: DynamoDBDocumentClient;

  constructor(options: GlossaryRepositoryOptions) {
    this.table = options.tableName;
    this.doc =
      options.client ?? DynamoDBDocumentClient.from(new DynamoDBClient({}));
  }

  /**
   * Exact-match lookup on the primary key. Returns null when no item exists.
   */
  async getByTerm(params: { term: string }): Promise<GlossaryEntry | null> {
    const { term } = params;
    const out = await this.doc.send(
      new GetCommand({
        TableName: this.table,
        Key: { term },
      })
    );
    if (!out.Item) return null;

    const parsed = GlossaryItemSchema.safeParse(out.Item);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map(issue => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new MalformedGlossaryItemError(term, detail);
    }
    return { term, definition: parsed.data.definition };
  }
}

let sharedRepository: GlossaryRepository | undefined;

/**
 * Repository for the configured glossary table, reused across warm invocations.
 */
export function getGlossaryRepository(): GlossaryRepository {
  if (!sharedRepository) {
    sharedRepository = new GlossaryRepository({
      tableName: resolveDynamoTableName(DynamoTable.Glossary),
    });
  }
  return sharedRepository;
}
