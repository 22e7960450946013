/**
 * src/types/global.d.ts
 *
 * Globals read by React's act() in the test environment.
 */

export {};

declare global {
  var IS_REACT_ACT_ENVIRONMENT: boolean | undefined;
}
