/**
 * Anything the gateway owns that needs explicit setup or teardown
 * (directories, sockets, timers). Both hooks are optional.
 */
export interface RuntimeResource {
  start?(): Promise<void>;
  close?(): Promise<void>;
}
