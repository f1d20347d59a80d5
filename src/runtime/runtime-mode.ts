/**
 * How the process was started. Decides process-level behavior at the composition root only.
 */
export type RuntimeMode =
  | { readonly kind: 'cli' }
  | { readonly kind: 'test' };
