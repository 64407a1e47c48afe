// Build-mode flag: true under Vitest, replaced with a NODE_ENV check by the library build
declare const __DEV__: boolean;
