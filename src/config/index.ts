export { loadConfig } from "./loader.js";
export { kushnConfigSchema, traversalPolicySchema, CONFIG_FILE } from "./schema.js";
export type { KushnConfig } from "./schema.js";
