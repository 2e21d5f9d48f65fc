// Injected by tsup (and by vitest.config.ts under test)
declare const __PACKAGE_VERSION__: string;
