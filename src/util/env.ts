/**
 * Environment helpers: stage detection and typed access to env vars.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  // Explicit APP_STAGE wins; STAGE is accepted for older deployments
  const explicit = process.env.APP_STAGE || process.env.STAGE;
  if (explicit && explicit.length > 0) return explicit;
  return getNodeEnv() === "production" ? "prod" : "dev";
}

export function isProduction(): boolean {
  return getStage() === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  // Jest sets NODE_ENV=test and JEST_WORKER_ID for every worker
  return getNodeEnv() === "test" || process.env.JEST_WORKER_ID !== undefined;
}

export interface GetEnvVarOptions<T> {
  defaultValue?: T;
  required?: boolean;
  /** When true (default), NAME__<stage> is consulted before NAME. */
  stageAware?: boolean;
}

function lookup(name: string, stageAware: boolean): string | undefined {
  const staged = stageAware ? process.env[`${name}__${getStage()}`] : undefined;
  const value = staged ?? process.env[name];
  return value != null && value !== "" ? value : undefined;
}

function resolve<T>(
  name: string,
  parse: (raw: string) => T,
  options: GetEnvVarOptions<T>
): T | undefined {
  const stageAware = options.stageAware !== false;
  const raw = lookup(name, stageAware);
  if (raw !== undefined) return parse(raw);
  if (options.defaultValue !== undefined) return options.defaultValue;
  if (options.required) {
    const tried = stageAware ? `${name}__${getStage()} or ${name}` : name;
    throw new Error(`Missing required env var: ${tried}`);
  }
  return undefined;
}

/**
 * Reads a raw string env var. Returns undefined when unset and not required.
 */
export function getEnvVar(
  name: string,
  options: GetEnvVarOptions<string> = {}
): string | undefined {
  return resolve(name, (raw) => raw, options);
}

export function getString(name: string, defaultValue: string): string;
export function getString(name: string): string | undefined;
export function getString(
  name: string,
  defaultValue?: string
): string | undefined {
  return resolve(name, (raw) => raw, { defaultValue });
}

export function getNumber(name: string, defaultValue: number): number;
export function getNumber(name: string): number | undefined;
export function getNumber(
  name: string,
  defaultValue?: number
): number | undefined {
  return resolve(
    name,
    (raw) => {
      const n = Number(raw);
      if (Number.isNaN(n))
        throw new Error(`Env var ${name} is not a number: ${raw}`);
      return n;
    },
    { defaultValue }
  );
}

export function getBoolean(name: string, defaultValue: boolean): boolean;
export function getBoolean(name: string): boolean | undefined;
export function getBoolean(
  name: string,
  defaultValue?: boolean
): boolean | undefined {
  return resolve(
    name,
    (raw) => {
      const lowered = raw.toLowerCase();
      if (["1", "true", "yes", "y"].includes(lowered)) return true;
      if (["0", "false", "no", "n"].includes(lowered)) return false;
      throw new Error(`Env var ${name} is not a boolean: ${raw}`);
    },
    { defaultValue }
  );
}
