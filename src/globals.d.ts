/** Compile-time flags, replaced by the `define` blocks of vite.config.ts and vitest.config.ts. */
declare const __DEV__: boolean;
declare const __PROD__: boolean;
