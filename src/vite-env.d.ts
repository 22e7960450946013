/**
 * src/vite-env.d.ts
 *
 * Ambient types for Vite client imports (stylesheets).
 */

/// <reference types="vite/client" />
