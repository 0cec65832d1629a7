/**
 * Readiness flag. Set by index.ts once the HTTP server is listening,
 * cleared on shutdown; read by the health endpoint.
 */

let ready = false;

export function isReady(): boolean {
  return ready;
}

export function setReady(value: boolean): void {
  ready = value;
}
