export { getEnv, parseEnv, resetEnvCache, type Env } from "./env";
export { envSchema } from "./schema";
