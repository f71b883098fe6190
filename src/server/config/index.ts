// Server code imports configuration from here, never from env.ts or unified.ts directly.
export { config } from './unified';
export type { AppConfig } from './unified';
export * from './env';
