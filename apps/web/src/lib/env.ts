import { ZodError, z } from "zod";

import { AppError } from "./errors";

type ProcessEnv = Record<string, string | undefined>;

const PRODUCTION_BUILD_PHASE = "phase-production-build";

const normalizeOptionalString = (value: unknown): string | undefined => {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const optionalString = () =>
  z.preprocess((value) => normalizeOptionalString(value), z.string().optional());

const optionalPositiveInt = () =>
  z.preprocess(
    (value) => normalizeOptionalString(value),
    z.coerce.number().int().positive().optional()
  );

const serverEnvSchema = z.object({
  ALERTS_RUNNER_SECRET: optionalString(),
  COMMIT_SHA: optionalString(),
  DATABASE_URL: z.preprocess(
    (value) => normalizeOptionalString(value),
    z
      .string()
      .regex(/^postgres(ql)?:\/\//, "must be a postgres:// connection string")
      .optional()
  ),
  JWT_ACCESS_TOKEN_EXPIRES_MINUTES: optionalPositiveInt(),
  JWT_SECRET: optionalString(),
  LOG_LEVEL: optionalString()
});

export type Env = z.infer<typeof serverEnvSchema>;
export type ValidateEnvOptions = {
  enforceProductionRequirements?: boolean;
};

const ENV_KEYS = Object.keys(serverEnvSchema.shape) as Array<keyof Env>;
const REQUIRED_IN_PRODUCTION: ReadonlyArray<keyof Env> = ["DATABASE_URL", "JWT_SECRET"];

let cachedStrictEnv: Env | null = null;
let cachedLenientEnv: Env | null = null;
let cachedSnapshot = "";

const shouldEnforceProductionRequirements = (): boolean => {
  if (process.env.NODE_ENV !== "production") {
    return false;
  }

  return process.env.NEXT_PHASE !== PRODUCTION_BUILD_PHASE;
};

const buildEnvSnapshot = (rawEnv: ProcessEnv): string => {
  const values = ENV_KEYS.map((key) => `${key}=${rawEnv[key] ?? ""}`);
  values.push(`NODE_ENV=${rawEnv.NODE_ENV ?? ""}`, `NEXT_PHASE=${rawEnv.NEXT_PHASE ?? ""}`);
  return values.join("\n");
};

const parseEnv = (rawEnv: ProcessEnv, enforceProductionRequirements: boolean): Env => {
  let parsed: Env;
  try {
    parsed = serverEnvSchema.parse(rawEnv);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new AppError(
        "configuration_error",
        500,
        `[env] Invalid environment configuration: ${details}`
      );
    }

    throw error;
  }

  if (!enforceProductionRequirements || !shouldEnforceProductionRequirements()) {
    return parsed;
  }

  const missing = REQUIRED_IN_PRODUCTION.filter((name) => !parsed[name]);
  if (missing.length > 0) {
    throw new AppError(
      "configuration_error",
      500,
      `[env] Missing required environment variables in production: ${missing.join(", ")}`
    );
  }

  return parsed;
};

/**
 * Parses and caches the process environment. The cache is keyed on a snapshot of
 * the tracked variables, so tests that mutate `process.env` see fresh values.
 */
export const validateEnv = (options: ValidateEnvOptions = {}): Env => {
  const enforceProductionRequirements = options.enforceProductionRequirements ?? true;
  const snapshot = buildEnvSnapshot(process.env);
  if (cachedSnapshot !== snapshot) {
    cachedSnapshot = snapshot;
    cachedStrictEnv = null;
    cachedLenientEnv = null;
  }

  if (enforceProductionRequirements && cachedStrictEnv) {
    return cachedStrictEnv;
  }

  if (!enforceProductionRequirements && cachedLenientEnv) {
    return cachedLenientEnv;
  }

  const parsed = parseEnv(process.env, enforceProductionRequirements);
  if (enforceProductionRequirements) {
    cachedStrictEnv = parsed;
  } else {
    cachedLenientEnv = parsed;
  }

  return parsed;
};

export const env = new Proxy({} as Env, {
  get(_target, prop: string | symbol): unknown {
    return Reflect.get(validateEnv(), prop);
  },
  has(_target, prop: string | symbol): boolean {
    return prop in validateEnv();
  },
  ownKeys(): ArrayLike<string | symbol> {
    return Reflect.ownKeys(validateEnv());
  },
  getOwnPropertyDescriptor(_target, prop: string | symbol): PropertyDescriptor | undefined {
    const resolved = validateEnv();
    if (!(prop in resolved)) {
      return undefined;
    }

    return {
      configurable: true,
      enumerable: true,
      writable: false,
      value: Reflect.get(resolved, prop)
    };
  }
});
