/**
 * Anything the gateway starts at boot and closes on shutdown.
 * Both hooks are optional; resources are started in declared order and
 * closed in reverse.
 */
export interface RuntimeResource {
  start?(): Promise<void>;
  close?(): Promise<void>;
}
