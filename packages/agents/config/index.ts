export { EnvSchema, loadConfig } from './env.js';
export type { Env, MarketIntelConfig } from './env.js';
