import { getEnvVar, getStage, getString } from "./env";

export enum DynamoTable {
  Glossary = "Glossary",
}

interface GetDynamoTableNameOptions {
  appName?: string;
  stage?: string;
}

const TABLE_SUFFIX: Record<DynamoTable, string> = {
  [DynamoTable.Glossary]: "GlossaryTable",
};

// Explicit per-table env overrides, injected by the deployment
const TABLE_ENV_OVERRIDE: Record<DynamoTable, string> = {
  [DynamoTable.Glossary]: "GLOSSARY_TABLE",
};

export function getDynamoTableName(
  table: DynamoTable,
  options: GetDynamoTableNameOptions = {}
): string {
  const appName = options.appName ?? getString("APP_NAME", "glossary-lookup");
  const stage = options.stage ?? getStage();
  return `${appName}-${stage}-${TABLE_SUFFIX[table]}`;
}

/**
 * Resolves the physical table name: the env override when present,
 * otherwise the `<app>-<stage>-<suffix>` convention.
 */
export function resolveDynamoTableName(table: DynamoTable): string {
  return getEnvVar(TABLE_ENV_OVERRIDE[table]) ?? getDynamoTableName(table);
}
