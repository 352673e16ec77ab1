export { identityBackendSchema, mergedConfigSchema, userConfigSchema } from "./config.schema";
export type { MergedConfigInput } from "./config.schema";
export type { AccessConfig } from "./config.types";
export { fromEnv, loadEnvFiles } from "./env";
export { buildAccessConfig, readAccessConfig, resetAccessConfigCache } from "./merge";
export { globalConfigDir } from "./paths";
export { toFriendlyZodError } from "./validation";
