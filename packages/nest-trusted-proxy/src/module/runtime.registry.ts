import { TrustedProxyRuntime } from './runtime';

let runtime: TrustedProxyRuntime | null = null;

/** Stores module-created runtime for middleware and decorators created outside DI. */
export function setTrustedProxyRuntime(next: TrustedProxyRuntime): void {
  runtime = next;
}

/** Returns the runtime registered by `TrustedProxyModule`, if available. */
export function getTrustedProxyRuntime(): TrustedProxyRuntime | null {
  return runtime;
}

export function clearTrustedProxyRuntime(): void {
  runtime = null;
}
