import { z } from "zod";

// an empty variable counts as unset
const unsetIfEmpty = (v: unknown) => (v === "" ? undefined : v);

const Env = z.object({
  SERVER_PORT: z.preprocess(unsetIfEmpty, z.coerce.number().int().min(0).max(65535).default(8080)),
  MAX_MAZES: z.preprocess(unsetIfEmpty, z.coerce.number().int().positive().default(256)),
  CORS_ORIGIN: z.preprocess(unsetIfEmpty, z.string().min(1).default("*"))
});

export type Config = {
  port: number;
  maxMazes: number;
  corsOrigin: string;
};

/** Reads the service settings; unset variables fall back to local-dev defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = Env.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`invalid environment: ${detail}`);
  }
  return {
    port: parsed.data.SERVER_PORT,
    maxMazes: parsed.data.MAX_MAZES,
    corsOrigin: parsed.data.CORS_ORIGIN
  };
}
