/**
 * Environment utilities for runtime/stage detection and env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  // SST_STAGE when deployed through SST, explicit STAGE otherwise; derive from NODE_ENV last
  const stage = process.env.SST_STAGE || process.env.STAGE;
  if (stage && stage.length > 0) return stage;
  return getNodeEnv() === "production" ? "prod" : "dev";
}

export function isProduction(): boolean {
  return getStage() === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test" || Boolean(process.env.JEST_WORKER_ID);
}

export function isLocal(): boolean {
  // No Lambda execution env (or an explicit local flag) means we run on a dev machine
  const localFlag =
    process.env.SST_DEV === "true" || process.env.IS_LOCAL === "true";
  const isLambda = Boolean(
    process.env.AWS_LAMBDA_FUNCTION_NAME || process.env.AWS_EXECUTION_ENV
  );
  return localFlag || !isLambda;
}

export interface GetEnvVarOptions {
  required?: boolean;
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
}

/**
 * Reads an environment variable.
 * - Unless `stageAware` is false, checks NAME__<stage> first (e.g. GLOSSARY_TABLE__prod), then NAME.
 * - Empty values count as missing; throws when missing and `required` is set.
 */
export function getEnvVar(
  name: string,
  options: GetEnvVarOptions = {}
): string | undefined {
  const stageKey = `${name}__${getStage()}`;
  const stageAware = options.stageAware !== false;

  const candidate = stageAware
    ? process.env[stageKey] || process.env[name]
    : process.env[name];

  if (candidate != null && candidate !== "") return candidate;

  if (options.required) {
    const tried = stageAware ? `${stageKey} or ${name}` : name;
    throw new Error(`Missing required env var: ${tried}`);
  }
  return undefined;
}

export function getString(name: string, defaultValue: string): string {
  return getEnvVar(name) ?? defaultValue;
}

